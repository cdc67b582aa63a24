import { describe, it, expect, vi, afterEach } from 'vitest';
import { PorkbunTransport } from '../../../src/providers/porkbun/PorkbunTransport.js';

describe('PorkbunTransport', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should POST JSON with the credentials in the body', async () => {
    const fetchMock = vi
      .spyOn(globalThis, 'fetch')
      .mockResolvedValue(new Response(JSON.stringify({ status: 'SUCCESS', yourIp: '127.0.0.1' }), { status: 200 }));
    const transport = new PorkbunTransport(
      { apiKey: 'test-key', secretApiKey: 'test-secret' },
      { baseUrl: 'https://registrar.test/api/json/v3/' }
    );

    const response = await transport.submit('POST', '/dns/retrieve/example.com', { start: 0 });

    expect(response).toEqual({ status: 200, body: { status: 'SUCCESS', yourIp: '127.0.0.1' } });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://registrar.test/api/json/v3/dns/retrieve/example.com');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(JSON.stringify({ start: 0, apikey: 'test-key', secretapikey: 'test-secret' }));
  });

  it('should keep a non-JSON body as text', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('<html>Bad gateway</html>', { status: 502 }));
    const transport = new PorkbunTransport({ apiKey: 'test-key', secretApiKey: 'test-secret' });

    await expect(transport.submit('POST', '/ping')).resolves.toEqual({ status: 502, body: '<html>Bad gateway</html>' });
  });

  it('should return an undefined body for an empty response', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(new Response(null, { status: 200 }));
    const transport = new PorkbunTransport({ apiKey: 'test-key', secretApiKey: 'test-secret' });

    await expect(transport.submit('POST', '/ping')).resolves.toEqual({ status: 200, body: undefined });
  });
});
