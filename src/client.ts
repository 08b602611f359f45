import { RemoteError, TransportError } from "./errors";
import { emitDebug } from "./output";
import type { RequestContext } from "./types";

export const API_KEY_HEADER = "Provisioning-Key";

type QueryValue = string | number | boolean | undefined;

export type HttpMethod = "GET" | "POST" | "DELETE";

type RequestOpts = {
  method?: HttpMethod;
  query?: Record<string, QueryValue>;
  body?: unknown;
};

export function buildUrl(base: string, path: string, query?: RequestOpts["query"]): string {
  const url = new URL(`${base.replace(/\/+$/, "")}${path}`);
  if (query) {
    for (const [k, v] of Object.entries(query)) {
      if (v === undefined) continue;
      url.searchParams.set(k, String(v));
    }
  }
  return url.toString();
}

export function buildHeaders(ctx: Pick<RequestContext, "apiKey">, hasBody: boolean): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: "application/json"
  };
  if (hasBody) headers["Content-Type"] = "application/json";
  if (ctx.apiKey) headers[API_KEY_HEADER] = ctx.apiKey;
  return headers;
}

type FetchedResponse = {
  status: number;
  statusText: string;
  ok: boolean;
  text: string;
};

// The timer and the external abort stay armed until the body has been read.
async function doFetch(ctx: RequestContext, url: string, opts: RequestOpts): Promise<FetchedResponse> {
  const method = opts.method ?? "GET";
  const hasBody = opts.body !== undefined;
  const fetchFn = ctx.fetchFn ?? fetch;

  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, ctx.timeoutMs);
  const onExternalAbort = (): void => controller.abort();
  if (ctx.signal?.aborted) {
    controller.abort();
  } else {
    ctx.signal?.addEventListener("abort", onExternalAbort, { once: true });
  }

  const abortError = (): TransportError | undefined => {
    if (timedOut) {
      return new TransportError(`Request timed out after ${ctx.timeoutMs}ms.`, {
        hint: "Increase --timeout-ms or set PYHSS_TIMEOUT_MS."
      });
    }
    if (ctx.signal?.aborted) {
      return new TransportError("Interrupted by user.", { interrupted: true });
    }
    return undefined;
  };

  try {
    let res: Response;
    try {
      res = await fetchFn(url, {
        method,
        headers: buildHeaders(ctx, hasBody),
        body: hasBody ? JSON.stringify(opts.body) : undefined,
        signal: controller.signal
      });
    } catch (err) {
      throw abortError() ?? new TransportError(`Could not reach the HSS API at ${ctx.api}.`, {
        hint: "Check --api / PYHSS_API and that the service is running.",
        cause: err
      });
    }
    emitDebug(ctx.verbose, `HTTP ${res.status}`);

    try {
      const text = await res.text();
      return { status: res.status, statusText: res.statusText, ok: res.ok, text };
    } catch (err) {
      throw abortError() ?? new TransportError("Connection dropped while reading the HSS API response.", {
        cause: err
      });
    }
  } finally {
    clearTimeout(timeout);
    ctx.signal?.removeEventListener("abort", onExternalAbort);
  }
}

/**
 * Issues exactly one request. Resolves with the parsed JSON body, the raw text
 * when the body is not JSON, or null when there is no body.
 */
export async function apiRequest(ctx: RequestContext, path: string, opts?: RequestOpts): Promise<unknown> {
  const requestOpts: RequestOpts = opts ?? {};
  const method = requestOpts.method ?? "GET";
  const url = buildUrl(ctx.api, path, requestOpts.query);

  emitDebug(ctx.verbose, `${method} ${url}`);
  const res = await doFetch(ctx, url, requestOpts);
  const text = res.text;

  if (!res.ok) {
    throw new RemoteError(res.status, res.statusText, text);
  }

  if (res.status === 204 || !text.trim()) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

export async function apiGet(
  ctx: RequestContext,
  path: string,
  query?: RequestOpts["query"]
): Promise<unknown> {
  return apiRequest(ctx, path, { method: "GET", query });
}

export async function apiPost(ctx: RequestContext, path: string, body: unknown): Promise<unknown> {
  return apiRequest(ctx, path, { method: "POST", body });
}

export async function apiDelete(ctx: RequestContext, path: string): Promise<unknown> {
  return apiRequest(ctx, path, { method: "DELETE" });
}
