/**
 * packages/node/src/net/httpClient.ts — Minimal HTTP helper over fetch.
 *
 * Requests resolve to an HttpResult instead of throwing. Non-2xx responses,
 * network failures, timeouts and undecodable JSON are all failures carrying a
 * message (and the status when a response arrived).
 */

import { DroidletError, type Logger, noopLogger } from "@droidlet/core";

export type HttpResult<T> =
  | Readonly<{ ok: true; status: number; value: T }>
  | Readonly<{ ok: false; status: number | null; error: string }>;

export type HttpHeaders = Readonly<Record<string, string>>;

export type FetchFn = typeof globalThis.fetch;

export type HttpClientOptions = Readonly<{
  appName: string;
  /** Per-request timeout. Default 30000. */
  timeoutMs?: number;
  /** Default https://www.google.com */
  connectivityUrl?: string;
  fetch?: FetchFn;
  logger?: Logger;
}>;

export interface HttpClient {
  readonly defaultHeaders: HttpHeaders;
  get(url: string, headers?: HttpHeaders): Promise<HttpResult<string>>;
  post(url: string, body: string, headers?: HttpHeaders): Promise<HttpResult<string>>;
  postJson(url: string, data: unknown, headers?: HttpHeaders): Promise<HttpResult<unknown>>;
  /** True when `url` answers 200 within the connectivity timeout. */
  isConnected(url?: string): Promise<boolean>;
}

const DEFAULT_TIMEOUT_MS = 30_000;
const CONNECTIVITY_TIMEOUT_MS = 5_000;
const DEFAULT_CONNECTIVITY_URL = "https://www.google.com";
export const CLIENT_VERSION = "1.0.0";

function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Merge header sets left to right; names compare case-insensitively and are sent lower-cased. */
export function mergeHeaders(...sets: readonly (HttpHeaders | undefined)[]): HttpHeaders {
  const merged: Record<string, string> = {};
  for (const set of sets) {
    if (set === undefined) continue;
    for (const [name, value] of Object.entries(set)) merged[name.toLowerCase()] = value;
  }
  return Object.freeze(merged);
}

export function createHttpClient(opts: HttpClientOptions): HttpClient {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw new DroidletError("DL_INVALID_PROPS", "timeoutMs must be a positive integer");
  }
  const fetchFn: FetchFn = opts.fetch ?? globalThis.fetch;
  const logger = (opts.logger ?? noopLogger).child(`HttpClient.${opts.appName}`);
  const connectivityUrl = opts.connectivityUrl ?? DEFAULT_CONNECTIVITY_URL;
  const defaultHeaders: HttpHeaders = Object.freeze({
    "User-Agent": `Droidlet-${opts.appName}/${CLIENT_VERSION}`,
  });

  const send = async (
    method: "GET" | "POST",
    url: string,
    headers: HttpHeaders,
    body?: string,
  ): Promise<HttpResult<string>> => {
    try {
      const init: RequestInit = {
        method,
        headers: { ...headers },
        signal: AbortSignal.timeout(timeoutMs),
      };
      if (body !== undefined) init.body = body;
      const res = await fetchFn(url, init);
      const text = await res.text();
      if (!res.ok) {
        const error = `${method} request failed for ${url}: HTTP ${res.status}`;
        logger.error(error);
        return Object.freeze({ ok: false, status: res.status, error });
      }
      logger.info(`${method} request successful: ${url}`);
      return Object.freeze({ ok: true, status: res.status, value: text });
    } catch (err) {
      const error = `${method} request failed for ${url}: ${describeError(err)}`;
      logger.error(error);
      return Object.freeze({ ok: false, status: null, error });
    }
  };

  const client: HttpClient = {
    defaultHeaders,

    get(url, headers) {
      return send("GET", url, mergeHeaders(defaultHeaders, headers));
    },

    post(url, body, headers) {
      return send(
        "POST",
        url,
        mergeHeaders(defaultHeaders, { "Content-Type": "application/json" }, headers),
        body,
      );
    },

    async postJson(url, data, headers) {
      let body: string;
      try {
        body = JSON.stringify(data);
      } catch (err) {
        const error = `Failed to encode JSON body: ${describeError(err)}`;
        logger.error(error);
        return Object.freeze({ ok: false, status: null, error });
      }
      const res = await client.post(url, body, headers);
      if (!res.ok) return res;
      try {
        const value: unknown = JSON.parse(res.value);
        return Object.freeze({ ok: true, status: res.status, value });
      } catch (err) {
        const error = `Failed to decode JSON response: ${describeError(err)}`;
        logger.error(error);
        return Object.freeze({ ok: false, status: res.status, error });
      }
    },

    async isConnected(url = connectivityUrl) {
      try {
        const res = await fetchFn(url, {
          method: "GET",
          headers: { ...mergeHeaders(defaultHeaders) },
          signal: AbortSignal.timeout(CONNECTIVITY_TIMEOUT_MS),
        });
        await res.body?.cancel();
        return res.status === 200;
      } catch (err) {
        logger.debug(`connectivity check failed: ${describeError(err)}`);
        return false;
      }
    },
  };

  return Object.freeze(client);
}
