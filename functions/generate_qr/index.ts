import { z } from 'zod';
import { createEdgeHandler } from '../_shared/edge-handler.ts';
import { errorResponse, pngResponse, readJsonBody } from '../_shared/http.ts';
import { renderPasswordQr } from '../_shared/qr.ts';

const qrRequestSchema = z.object({
  password: z.string().min(1),
});

export const generateQrHandler = createEdgeHandler(
  async ({ request }) => {
    const parsed = qrRequestSchema.safeParse(await readJsonBody(request));
    if (!parsed.success) {
      return errorResponse('Password is required', 400, 'validation_error');
    }

    const png = await renderPasswordQr(parsed.data.password);
    return pngResponse(png);
  },
  { method: 'POST' },
);
