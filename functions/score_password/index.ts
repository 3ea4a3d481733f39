import { scorePassword } from '@keysmith/shared';
import { z } from 'zod';
import { createEdgeHandler } from '../_shared/edge-handler.ts';
import { errorResponse, jsonResponse, readJsonBody } from '../_shared/http.ts';

const scoreRequestSchema = z.object({
  password: z.string().min(1),
});

export const scorePasswordHandler = createEdgeHandler(
  async ({ request }) => {
    const parsed = scoreRequestSchema.safeParse(await readJsonBody(request));
    if (!parsed.success) {
      return errorResponse('Password is required', 400, 'validation_error');
    }

    const { password } = parsed.data;
    const { entropyBits, label } = scorePassword(password);
    return jsonResponse({
      entropy: entropyBits,
      strength: label,
      length: [...password].length,
    });
  },
  { method: 'POST' },
);
