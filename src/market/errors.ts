import type { ProviderId } from "./types";

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
* The local file exists but is not a readable price series. A missing file is
* not an error; see `readLocalSeries`.
*/
export class MalformedLocalDataError extends Error {
  readonly path: string;

  constructor(path: string, reason: string, options?: ErrorOptions) {
    super(`[history:storage] Malformed local data in ${path}: ${reason}`, options);
    this.name = "MalformedLocalDataError";
    this.path = path;
  }
}

/**
* Network failure, provider rejection or an unparseable provider response.
*/
export class RemoteFetchError extends Error {
  readonly provider: ProviderId;
  readonly symbol: string | null;

  constructor(provider: ProviderId, symbol: string | null, reason: string, options?: ErrorOptions) {
    const subject = symbol === null ? "" : ` for ${symbol}`;
    super(`[history:${provider}] Fetch failed${subject}: ${reason}`, options);
    this.name = "RemoteFetchError";
    this.provider = provider;
    this.symbol = symbol;
  }
}

/**
* The local file exists but could not be read (permissions, a directory in its place).
*/
export class LocalReadError extends Error {
  readonly path: string;

  constructor(path: string, reason: string, options?: ErrorOptions) {
    super(`[history:storage] Failed reading ${path}: ${reason}`, options);
    this.name = "LocalReadError";
    this.path = path;
  }
}

export class PersistenceError extends Error {
  readonly path: string;

  constructor(path: string, reason: string, options?: ErrorOptions) {
    super(`[history:storage] Failed writing ${path}: ${reason}`, options);
    this.name = "PersistenceError";
    this.path = path;
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(`[history:config] ${message}`, options);
    this.name = "ConfigError";
  }
}

/**
* Raised by the batch runner under the `abort` policy; `cause` holds the original error.
*/
export class SymbolUpdateError extends Error {
  readonly symbol: string;

  constructor(symbol: string, cause: unknown) {
    super(`[history:update] ${symbol} failed: ${errorMessage(cause)}`, { cause });
    this.name = "SymbolUpdateError";
    this.symbol = symbol;
  }
}
