import "./lib/load-env";

import { parseUpdateArgs } from "./lib/args";
import { loadHistoryConfig, loadSymbols, resolveRunConfig } from "../src/market/config";
import { errorMessage } from "../src/market/errors";
import { runHistoryUpdate } from "../src/market/pipeline";
import { createFetcher } from "../src/market/providers";

try {
  const args = parseUpdateArgs(process.argv.slice(2));
  const config = resolveRunConfig(await loadHistoryConfig(args.configPath), args);
  const symbols = args.symbols ?? (await loadSymbols());
  const fetcher = await createFetcher(config, { totp: args.totp ?? process.env.FIVEPAISA_TOTP });

  const res = await runHistoryUpdate({
    symbols,
    interval: config.interval,
    readDir: config.readDir,
    saveDir: config.saveDir,
    fetcher,
    onError: config.onError,
    startOverride: config.startOverride,
    full: config.full
  });

  console.log(JSON.stringify({ stage: "update", ...res }, null, 2));
  if (res.failedSymbols.length > 0) {
    process.exitCode = 1;
  }
} catch (error) {
  console.error(`[history:update] aborted: ${errorMessage(error)}`);
  process.exitCode = 1;
}
