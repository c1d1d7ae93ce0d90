import { HttpError, MalformedResponseError } from "../../domain/errors";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type QueryValue = string | number | null | undefined;

export interface OpenAqClientOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

export class OpenAqClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: OpenAqClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  // Null and undefined parameters are left out of the query string entirely
  buildUrl(pathname: string, query: Record<string, QueryValue> = {}): string {
    const url = new URL(`${this.baseUrl}${pathname.startsWith("/") ? pathname : `/${pathname}`}`);
    for (const [name, value] of Object.entries(query)) {
      if (value === undefined || value === null) continue;
      url.searchParams.set(name, String(value));
    }
    return url.toString();
  }

  /** GET and decode JSON. Throws HttpError on non-2xx and MalformedResponseError on undecodable bodies. */
  async getJson(pathname: string, query: Record<string, QueryValue> = {}): Promise<unknown> {
    const url = this.buildUrl(pathname, query);
    const res = await this.fetchImpl(url, {
      method: "GET",
      headers: { "X-API-Key": this.apiKey, Accept: "application/json" },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!res.ok) {
      const body = await res.text().catch(() => "<no body>");
      throw new HttpError({ url, status: res.status, statusText: res.statusText, body });
    }
    const text = await res.text();
    try {
      return JSON.parse(text);
    } catch {
      throw new MalformedResponseError(url, "body is not JSON");
    }
  }
}
