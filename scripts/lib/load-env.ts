/**
* Loads credentials from `.env.local` then `.env` without overriding variables that
* are already set.
*
* Side-effect module: import it first so `process.env` is populated before any other
* module reads it.
*/

import { existsSync } from "node:fs";
import { resolve } from "node:path";

import { config } from "dotenv";

export function loadEnv(rootDir = process.cwd()): void {
  for (const candidate of [".env.local", ".env"]) {
    const envPath = resolve(rootDir, candidate);
    if (existsSync(envPath)) {
      config({ path: envPath, override: false });
    }
  }
}

loadEnv();
