import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { config as loadEnv } from "dotenv";
import { z } from "zod";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const envFile = process.env.ENV_FILE;

const candidateEnvPaths = envFile
  ? [envFile]
  : [
      resolve(process.cwd(), ".env"),
      resolve(__dirname, "../.env"),
      resolve(__dirname, "../../.env"),
      resolve(__dirname, "../../../.env"),
    ];

candidateEnvPaths.forEach((candidate) => {
  if (!candidate) {
    return;
  }
  if (existsSync(candidate)) {
    loadEnv({ path: candidate, override: false });
  }
});

const numeric = z
  .string()
  .regex(/^\d+$/, "expected a non-negative integer")
  .optional();

const envSchema = z.object({
  TELEMETRY_HOST: z.string().optional(),
  TELEMETRY_PORT: numeric,
  LOG_LEVEL: z.string().default("info"),
  SERVICE_NAME: z.string().optional(),
  READ_TIMEOUT_MS: numeric,
  PRODUCER_INTERVAL_MS: numeric,
  PRODUCER_MAX_BURST: numeric,
  PRODUCER_RECONNECT_MS: numeric,
  GATEWAY_PORT: numeric,
  HTTP_PORT: numeric,
  RELAY_ENABLED: z.enum(["true", "false"]).optional(),
});

const parsed = envSchema.parse(process.env);

const isTestEnvironment = process.env.NODE_ENV === "test";

const toInt = (value: string | undefined, fallback: number) => {
  if (!value) {
    return fallback;
  }
  const parsedValue = Number.parseInt(value, 10);
  return Number.isNaN(parsedValue) ? fallback : parsedValue;
};

export type Config = {
  telemetryHost: string;
  telemetryPort: number;
  logLevel: string;
  serviceName: string;
  isTestEnvironment: boolean;
  readTimeoutMs: number;
  producerIntervalMs: number;
  producerMaxBurst: number;
  producerReconnectMs: number;
  gatewayPort: number;
  httpPort: number;
  relayEnabled: boolean;
};

export const config: Config = {
  telemetryHost: parsed.TELEMETRY_HOST ?? "127.0.0.1",
  telemetryPort: toInt(parsed.TELEMETRY_PORT, 12345),
  logLevel: parsed.LOG_LEVEL,
  serviceName: parsed.SERVICE_NAME ?? "ticktape",
  isTestEnvironment,
  // 0 disables the idle read deadline
  readTimeoutMs: toInt(parsed.READ_TIMEOUT_MS, 0),
  producerIntervalMs: Math.max(toInt(parsed.PRODUCER_INTERVAL_MS, 1000), 50),
  producerMaxBurst: Math.max(toInt(parsed.PRODUCER_MAX_BURST, 5), 1),
  producerReconnectMs: toInt(parsed.PRODUCER_RECONNECT_MS, 2000),
  gatewayPort: toInt(parsed.GATEWAY_PORT, 4001),
  httpPort: toInt(parsed.HTTP_PORT, 4000),
  relayEnabled: parsed.RELAY_ENABLED !== "false",
};
