/**
 * The capability a provider needs to reach its registrar.
 * Implementations attach credentials; a network failure is thrown.
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface TransportResponse {
  status: number;
  body: unknown;
}

export interface RegistrarTransport {
  submit(method: HttpMethod, path: string, body?: Record<string, unknown>): Promise<TransportResponse>;
}
