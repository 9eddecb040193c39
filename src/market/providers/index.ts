import type { AxiosInstance } from "axios";

import type { HistoryRunConfig } from "../config";
import { loadFivePaisaCredentials } from "../credentials";
import { ConfigError } from "../errors";
import { loadScripCodes } from "../scripCodes";
import { FivePaisaHistoryFetcher } from "./fivepaisa";
import { FivePaisaClient } from "./fivepaisaClient";
import type { PriceHistoryFetcher } from "./types";
import { YahooHistoryFetcher } from "./yahoo";

export type { FetchRequest, PriceHistoryFetcher } from "./types";

/**
* Builds the fetcher selected by `config.provider`. For 5paisa this logs in with
* `totp` before returning.
*/
export async function createFetcher(
  config: HistoryRunConfig,
  opts: { totp?: string; env?: NodeJS.ProcessEnv; http?: AxiosInstance } = {}
): Promise<PriceHistoryFetcher> {
  switch (config.provider) {
    case "yahoo":
      return new YahooHistoryFetcher({ symbolSuffix: config.yahoo.symbolSuffix });
    case "fivepaisa": {
      if (!opts.totp) {
        throw new ConfigError("5paisa needs a TOTP: pass --totp or set FIVEPAISA_TOTP");
      }

      const scripCodes = await loadScripCodes(config.fivepaisa.scripCodesFile);
      const client = new FivePaisaClient(loadFivePaisaCredentials(opts.env), { http: opts.http });
      await client.login(opts.totp);

      return new FivePaisaHistoryFetcher({
        session: client,
        scripCodes,
        exchange: config.fivepaisa.exchange,
        exchangeSegment: config.fivepaisa.exchangeSegment,
        intraday: config.fivepaisa.intraday,
        historyStart: config.fivepaisa.historyStart,
        batchDays: config.fivepaisa.batchDays,
        callsPerMinute: config.fivepaisa.callsPerMinute
      });
    }
  }
}
