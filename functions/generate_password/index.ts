import { generatePassword, generationRequestSchema, scorePassword } from '@keysmith/shared';
import { createEdgeHandler } from '../_shared/edge-handler.ts';
import { errorResponse, jsonResponse, readJsonBody } from '../_shared/http.ts';

export const generatePasswordHandler = createEdgeHandler(
  async ({ request }) => {
    const parsed = generationRequestSchema.safeParse(await readJsonBody(request));
    if (!parsed.success) {
      return errorResponse(
        parsed.error.issues.map((issue) => issue.message).join(', ') || 'Invalid payload',
        422,
        'validation_error',
      );
    }

    const password = generatePassword(parsed.data);
    const { entropyBits, label } = scorePassword(password);

    return jsonResponse({
      password,
      entropy: entropyBits,
      strength: label,
      length: [...password].length,
    });
  },
  { method: 'POST' },
);
