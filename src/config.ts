import { UsageError } from "./errors";
import type { CliConfig, GlobalOptions } from "./types";

export const DEFAULT_API = "http://127.0.0.1:8080";
export const DEFAULT_TIMEOUT_MS = 15_000;

export type Env = Record<string, string | undefined>;

export type RawGlobalOptions = {
  api?: string;
  apiKey?: string;
  timeoutMs?: number;
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
};

function nonEmpty(value: string | undefined): string | undefined {
  const v = value?.trim();
  return v ? v : undefined;
}

function normalizeApi(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new UsageError(`Invalid API URL: ${value}`, {
      hint: "Pass --api http://host:port or set PYHSS_API."
    });
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new UsageError(`Unsupported API URL scheme: ${url.protocol}`, {
      hint: "Use an http:// or https:// URL."
    });
  }
  return value.trim().replace(/\/+$/, "");
}

function timeoutFromEnv(env: Env): number | undefined {
  const raw = nonEmpty(env.PYHSS_TIMEOUT_MS);
  if (!raw) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n) || !Number.isInteger(n) || n <= 0) {
    throw new UsageError(`Invalid PYHSS_TIMEOUT_MS value: ${raw}`);
  }
  return n;
}

/**
 * Resolves the invocation's configuration once: command-line flag first, then
 * the environment, then the built-in default. The result is frozen and passed
 * down explicitly.
 */
export function resolveConfig(opts: RawGlobalOptions, env: Env): Readonly<CliConfig> {
  const quiet = Boolean(opts.quiet);
  const verbose = Boolean(opts.verbose);
  if (quiet && verbose) {
    throw new UsageError("Use either --quiet or --verbose, not both.");
  }

  const api = normalizeApi(nonEmpty(opts.api) ?? nonEmpty(env.PYHSS_API) ?? DEFAULT_API);
  const apiKey = nonEmpty(opts.apiKey) ?? nonEmpty(env.PYHSS_APIKEY);
  const timeoutMs = opts.timeoutMs ?? timeoutFromEnv(env) ?? DEFAULT_TIMEOUT_MS;

  const config: CliConfig = {
    api,
    timeoutMs,
    json: Boolean(opts.json),
    quiet,
    verbose
  };
  if (apiKey) config.apiKey = apiKey;
  return Object.freeze(config);
}

export function fallbackOptionsFromArgv(argv: string[]): GlobalOptions {
  const has = (x: string): boolean => argv.includes(x);
  return {
    json: has("--json"),
    quiet: has("--quiet") || has("-q"),
    verbose: has("--verbose") || has("-v")
  };
}
