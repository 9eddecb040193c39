import { readFile } from "node:fs/promises";

import { parse } from "csv-parse/sync";

import { ConfigError, errorMessage } from "./errors";

const SCRIP_CODE_RE = /^\d+$/;

/**
* Parses `SYMBOL,SCRIPCODE` rows into a lookup map. A leading header row (one whose
* code column is not numeric) is skipped.
*/
export function parseScripCodes(raw: string, source: string): Map<string, string> {
  let rows: unknown;
  try {
    rows = parse(raw, { bom: true, skip_empty_lines: true, trim: true, relax_column_count: true });
  } catch (error) {
    throw new ConfigError(`Unreadable scrip code file ${source}: ${errorMessage(error)}`, { cause: error });
  }

  if (!Array.isArray(rows)) {
    throw new ConfigError(`Unreadable scrip code file ${source}`);
  }

  const out = new Map<string, string>();
  rows.forEach((row: unknown, idx) => {
    const [symbol, code] = Array.isArray(row) ? row : [];
    if (typeof symbol !== "string" || typeof code !== "string") {
      throw new ConfigError(`${source} line ${idx + 1}: expected SYMBOL,SCRIPCODE`);
    }

    if (!SCRIP_CODE_RE.test(code)) {
      if (idx === 0) {
        return;
      }
      throw new ConfigError(`${source} line ${idx + 1}: scrip code '${code}' is not numeric`);
    }

    out.set(symbol, code);
  });

  return out;
}

export async function loadScripCodes(filePath: string): Promise<Map<string, string>> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read scrip code file ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  return parseScripCodes(raw, filePath);
}
