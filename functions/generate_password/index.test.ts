import { calculateEntropy, STRENGTH_LABELS } from '@keysmith/shared';
import { describe, expect, it } from 'vitest';
import { generatePasswordHandler } from './index.ts';

type GenerateResponse = {
  password: string;
  entropy: number;
  strength: string;
  length: number;
};

function generate(body: string): Promise<Response> {
  return generatePasswordHandler(
    new Request('http://localhost/api/v1/generate', { method: 'POST', body }),
  );
}

describe('generatePasswordHandler', () => {
  it('generates a default 16 character password with its score', async () => {
    const response = await generate('{}');
    expect(response.status).toBe(200);
    expect(response.headers.get('Content-Type')).toBe('application/json');

    const payload = (await response.json()) as GenerateResponse;
    expect(payload.length).toBe(16);
    expect(payload.password).toHaveLength(16);
    expect(payload.entropy).toBe(calculateEntropy(payload.password));
    expect(STRENGTH_LABELS).toContain(payload.strength);
  });

  it('honours the requested classes', async () => {
    const response = await generate(
      JSON.stringify({ length: 8, includeLowercase: false, includeUppercase: false, includeSymbols: false }),
    );
    const payload = (await response.json()) as GenerateResponse;

    expect(payload.password).toMatch(/^[0-9]{8}$/);
    expect(payload.entropy).toBeCloseTo(Math.log2(10) * 8, 10);
  });

  it('rejects a length beyond the maximum', async () => {
    const response = await generate(JSON.stringify({ length: 500 }));

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      error: 'Length must be at most 128',
      code: 'validation_error',
    });
  });

  it('reports a configuration with no character class', async () => {
    const response = await generate(
      JSON.stringify({
        includeLowercase: false,
        includeUppercase: false,
        includeDigits: false,
        includeSymbols: false,
      }),
    );

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      error: 'At least one character type must be selected',
      code: 'no_character_class',
    });
  });

  it('reports a length too short for the required characters', async () => {
    const response = await generate(JSON.stringify({ length: 2, includeSymbols: false }));

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      error: 'Length too short to include required characters',
      code: 'length_too_short',
    });
  });

  it('requires a body', async () => {
    const response = await generate('');

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'No body provided', code: 'missing_body' });
  });
});
