/**
 * fetch-based transport for the Porkbun JSON API.
 * Credentials travel in the JSON body of every request.
 */
import type { HttpMethod, RegistrarTransport, TransportResponse } from '../base/transport.js';

export interface PorkbunCredentials {
  apiKey: string;
  secretApiKey: string;
}

export interface PorkbunTransportOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

export const PORKBUN_API_URL = 'https://api.porkbun.com/api/json/v3';

export class PorkbunTransport implements RegistrarTransport {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly credentials: PorkbunCredentials,
    options: PorkbunTransportOptions = {}
  ) {
    this.baseUrl = (options.baseUrl ?? PORKBUN_API_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 15000;
  }

  async submit(method: HttpMethod, path: string, body: Record<string, unknown> = {}): Promise<TransportResponse> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      body: JSON.stringify({
        ...body,
        apikey: this.credentials.apiKey,
        secretapikey: this.credentials.secretApiKey,
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const text = await response.text();
    return { status: response.status, body: parseBody(text) };
  }
}

/**
 * JSON when it parses, otherwise the raw text (proxies answer with HTML)
 */
function parseBody(text: string): unknown {
  if (text.length === 0) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}
