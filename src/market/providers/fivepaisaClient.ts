import axios, { type AxiosInstance } from "axios";

import { RemoteFetchError, errorMessage } from "../errors";
import type { MarketInterval } from "../types";

export const FIVEPAISA_LOGIN_URL = "https://Openapi.5paisa.com/VendorsAPI/Service1.svc";
export const FIVEPAISA_HISTORICAL_URL = "https://openapi.5paisa.com/V2/historical";

export type FivePaisaCredentials = {
  userKey: string;
  encryptionKey: string;
  userId: string;
  clientCode: string;
  pin: string;
  subscriptionKey?: string;
};

export type FivePaisaCandleRequest = {
  /** `N` (NSE), `B` (BSE) or `M` (MCX). */
  exchange: string;
  /** `C` cash, `D` derivatives, `U` currency. */
  exchangeSegment: string;
  scripCode: string;
  interval: MarketInterval;
  from: string;
  to: string;
};

/**
* `[datetime, open, high, low, close, volume]`, datetime in IST without offset.
*/
export type FivePaisaCandle = [string, number, number, number, number, number];

/**
* An authenticated 5paisa session. Login and token handling stay behind this seam so
* the fetcher only ever asks for candles.
*/
export interface FivePaisaSession {
  isLoggedIn(): boolean;
  historicalCandles(request: FivePaisaCandleRequest): Promise<FivePaisaCandle[]>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readBodyToken(data: unknown, key: string, step: string): string {
  const body = isRecord(data) ? data.body : undefined;
  if (!isRecord(body)) {
    throw new Error(`${step} response has no body`);
  }

  const status = body.Status;
  if (typeof status === "number" && status !== 0) {
    const message = typeof body.Message === "string" ? body.Message : "no message";
    throw new Error(`${step} rejected (Status ${status}): ${message}`);
  }

  const token = body[key];
  if (typeof token !== "string" || token.length === 0) {
    throw new Error(`${step} response is missing ${key}`);
  }

  return token;
}

function isCandle(value: unknown): value is FivePaisaCandle {
  return (
    Array.isArray(value) &&
    value.length >= 6 &&
    typeof value[0] === "string" &&
    value.slice(1, 6).every((n) => typeof n === "number" && Number.isFinite(n))
  );
}

export function parseCandles(data: unknown): FivePaisaCandle[] {
  const payload = isRecord(data) ? data.data : undefined;
  const candles = isRecord(payload) ? payload.candles : undefined;
  if (!Array.isArray(candles)) {
    const message = isRecord(data) && typeof data.message === "string" ? `: ${data.message}` : "";
    throw new Error(`historical response has no candles${message}`);
  }

  return candles.map((candle, idx) => {
    if (!isCandle(candle)) {
      throw new Error(`malformed candle at index ${idx}: ${JSON.stringify(candle)}`);
    }
    return candle;
  });
}

export type FivePaisaClientOptions = {
  http?: AxiosInstance;
};

/**
* Minimal 5paisa OpenAPI client: TOTP login plus historical candles.
*/
export class FivePaisaClient implements FivePaisaSession {
  readonly #http: AxiosInstance;
  readonly #credentials: FivePaisaCredentials;
  #accessToken: string | null = null;

  constructor(credentials: FivePaisaCredentials, options: FivePaisaClientOptions = {}) {
    this.#credentials = credentials;
    this.#http = options.http ?? axios.create({ timeout: 30_000 });
  }

  /**
  * Exchanges a TOTP for a request token, then the request token for an access token.
  */
  async login(totp: string): Promise<void> {
    const { userKey, encryptionKey, userId, clientCode, pin } = this.#credentials;

    try {
      const loginRes = await this.#http.post<unknown>(`${FIVEPAISA_LOGIN_URL}/TOTPLogin`, {
        head: { Key: userKey },
        body: { Email_ID: clientCode, TOTP: totp, PIN: pin }
      });
      const requestToken = readBodyToken(loginRes.data, "RequestToken", "TOTPLogin");

      const tokenRes = await this.#http.post<unknown>(`${FIVEPAISA_LOGIN_URL}/GetAccessToken`, {
        head: { Key: userKey },
        body: { RequestToken: requestToken, EncryKey: encryptionKey, UserId: userId }
      });
      this.#accessToken = readBodyToken(tokenRes.data, "AccessToken", "GetAccessToken");
    } catch (error) {
      this.#accessToken = null;
      throw new RemoteFetchError("fivepaisa", null, `login failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  isLoggedIn(): boolean {
    return this.#accessToken !== null;
  }

  async historicalCandles(request: FivePaisaCandleRequest): Promise<FivePaisaCandle[]> {
    const token = this.#accessToken;
    if (token === null) {
      throw new Error("not logged in; call login(totp) first");
    }

    const { exchange, exchangeSegment, scripCode, interval, from, to } = request;
    const url = [FIVEPAISA_HISTORICAL_URL, exchange, exchangeSegment, scripCode, interval]
      .map((part, idx) => (idx === 0 ? part : encodeURIComponent(part)))
      .join("/");

    const headers: Record<string, string> = {
      "x-clientcode": this.#credentials.clientCode,
      "x-auth-token": token
    };
    if (this.#credentials.subscriptionKey) {
      headers["Ocp-Apim-Subscription-Key"] = this.#credentials.subscriptionKey;
    }

    const res = await this.#http.get<unknown>(url, { params: { from, end: to }, headers });
    return parseCandles(res.data);
  }
}
