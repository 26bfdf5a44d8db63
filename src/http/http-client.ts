import { STATUS_CODES } from "node:http";

export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export interface HttpResponse {
  url: string;
  status: number;
  statusText: string;
  /** Status code and reason phrase, e.g. `503 Service Unavailable`. */
  statusLine: string;
  ok: boolean;
  headers: Record<string, string>;
  /** Body decoded as UTF-8 text. */
  body: string;
  bytes: Uint8Array;
}

/**
 * Transport used by the forecast client. The client overwrites `agent` and
 * `timeoutSeconds` before every request.
 */
export interface HttpClient {
  agent: string;
  timeoutSeconds: number;
  get(url: string): Promise<HttpResponse>;
}

// Largest delay a Node timer takes without overflowing to 1 ms.
export const MAX_TIMEOUT_SECONDS = 2_147_483;

/** Falls back to the standard reason phrase when the server sent none. */
export function statusLine(status: number, statusText: string): string {
  const reason = statusText || STATUS_CODES[status];
  return reason ? `${status} ${reason}` : String(status);
}

export function timeoutMilliseconds(seconds: number): number {
  return Math.ceil(Math.min(seconds, MAX_TIMEOUT_SECONDS) * 1000);
}

export class FetchHttpClient implements HttpClient {
  agent = "";
  timeoutSeconds = 30;

  constructor(private readonly fetcher: FetchLike = fetch) {}

  async get(url: string): Promise<HttpResponse> {
    const headers: Record<string, string> = {};
    if (this.agent) {
      headers["User-Agent"] = this.agent;
    }

    const response = await this.fetcher(url, {
      method: "GET",
      headers,
      signal: AbortSignal.timeout(timeoutMilliseconds(this.timeoutSeconds))
    });

    const bytes = new Uint8Array(await response.arrayBuffer());
    const responseHeaders: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      responseHeaders[key] = value;
    });

    return {
      url,
      status: response.status,
      statusText: response.statusText,
      statusLine: statusLine(response.status, response.statusText),
      ok: response.ok,
      headers: responseHeaders,
      body: new TextDecoder().decode(bytes),
      bytes
    };
  }
}
