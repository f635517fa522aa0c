import pino, { type Logger } from "pino";
import type { LogLevel } from "./types.js";

const LOG_LEVELS: readonly LogLevel[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

export const resolveLogLevel = (
  env: NodeJS.ProcessEnv | undefined = process.env
): LogLevel => {
  const resolvedEnv = env ?? process.env;
  const envLevel = resolvedEnv.SPATIALNB_LOG_LEVEL;
  if (!envLevel) {
    return resolvedEnv.VITEST || resolvedEnv.NODE_ENV === "test"
      ? "silent"
      : "info";
  }
  const normalized = envLevel.trim().toLowerCase();
  if (["false", "off", "none", "silent"].includes(normalized)) {
    return "silent";
  }
  return isLogLevel(normalized) ? normalized : "info";
};

export const createLogger = (
  name: string,
  env: NodeJS.ProcessEnv | undefined = process.env
): Logger => pino({ name, level: resolveLogLevel(env) });

export type { Logger };
