import { ConfigError } from "./errors";
import type { FivePaisaCredentials } from "./providers/fivepaisaClient";

const REQUIRED_ENV = {
  userKey: "FIVEPAISA_USER_KEY",
  encryptionKey: "FIVEPAISA_ENCRYPTION_KEY",
  userId: "FIVEPAISA_USER_ID",
  clientCode: "FIVEPAISA_CLIENT_CODE",
  pin: "FIVEPAISA_PIN"
} as const;

export function loadFivePaisaCredentials(env: NodeJS.ProcessEnv = process.env): FivePaisaCredentials {
  const missing = Object.values(REQUIRED_ENV).filter((name) => !env[name]);
  if (missing.length > 0) {
    throw new ConfigError(`Missing 5paisa credentials in environment: ${missing.join(", ")}`);
  }

  const read = (name: string): string => env[name] ?? "";
  const subscriptionKey = env.FIVEPAISA_SUBSCRIPTION_KEY;

  return {
    userKey: read(REQUIRED_ENV.userKey),
    encryptionKey: read(REQUIRED_ENV.encryptionKey),
    userId: read(REQUIRED_ENV.userId),
    clientCode: read(REQUIRED_ENV.clientCode),
    pin: read(REQUIRED_ENV.pin),
    ...(subscriptionKey ? { subscriptionKey } : {})
  };
}
