import { describe, expect, it } from 'vitest';
import { generateQrHandler } from './index.ts';

function requestQr(body: string, method = 'POST'): Promise<Response> {
  return generateQrHandler(
    new Request('http://localhost/api/v1/qr', method === 'POST' ? { method, body } : { method }),
  );
}

describe('generateQrHandler', () => {
  it('returns a PNG for a password', async () => {
    const response = await requestQr(JSON.stringify({ password: 'test-secret' }));

    expect(response.status).toBe(200);
    expect(response.headers.get('Content-Type')).toBe('image/png');
    const bytes = new Uint8Array(await response.arrayBuffer());
    expect([...bytes.subarray(0, 4)]).toEqual([0x89, 0x50, 0x4e, 0x47]);
  });

  it('requires a password', async () => {
    const response = await requestQr(JSON.stringify({}));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Password is required', code: 'validation_error' });
  });

  it('rejects a password too long to scan', async () => {
    const response = await requestQr(JSON.stringify({ password: 'a'.repeat(300) }));

    expect(response.status).toBe(422);
    expect(await response.json()).toMatchObject({ code: 'qr_module_too_small' });
  });

  it('only accepts POST', async () => {
    const response = await requestQr('', 'GET');

    expect(response.status).toBe(405);
  });
});
