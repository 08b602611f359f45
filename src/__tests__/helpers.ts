import { vi } from "vitest";
import { runCli } from "../cli";
import type { Env } from "../config";
import type { FetchFn } from "../types";

export type RecordedRequest = {
  url: string;
  method: string;
  headers: Headers;
  body: unknown;
};

/** Fake fetch that answers every request with the same status and body */
export function fakeFetch(status: number, body?: unknown, statusText = "") {
  const requests: RecordedRequest[] = [];
  const fetchFn: FetchFn = async (url, init) => {
    requests.push({
      url,
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    });
    if (body === undefined || status === 204) {
      return new Response(null, { status, statusText });
    }
    const text = typeof body === "string" ? body : JSON.stringify(body);
    return new Response(text, { status, statusText });
  };
  return { fetchFn, requests };
}

/** Fake fetch that never answers and rejects once its signal aborts */
export function hangingFetch(): FetchFn {
  return (_url, init) =>
    new Promise<Response>((_resolve, reject) => {
      const signal = init?.signal;
      if (signal?.aborted) {
        reject(new Error("This operation was aborted"));
        return;
      }
      signal?.addEventListener("abort", () => reject(new Error("This operation was aborted")));
    });
}

/** Capture everything written to stdout/stderr until vi.restoreAllMocks() */
export function captureOutput() {
  const stdout: string[] = [];
  const stderr: string[] = [];
  vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
    stdout.push(String(chunk));
    return true;
  });
  vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
    stderr.push(String(chunk));
    return true;
  });
  return {
    stdout: () => stdout.join(""),
    stderr: () => stderr.join(""),
  };
}

export async function runHssctl(args: string[], opts: { env?: Env; fetchFn?: FetchFn; signal?: AbortSignal } = {}) {
  return runCli(["node", "hssctl", ...args], {
    env: opts.env ?? {},
    fetchFn: opts.fetchFn,
    signal: opts.signal,
  });
}
