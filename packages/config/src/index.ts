import { z } from "zod";
import { DEFAULT_METADATA_NAMESPACE } from "@spatialnb/window-schema";
import type {
  LogLevel,
  RemoteServerConfig,
  RuntimeSettings,
  WorkspaceConfig,
} from "./types.js";

declare global {
  var __SPATIALNB_SETTINGS__: Partial<RuntimeSettings> | undefined;
}

export const DEFAULT_SERVER_URL = "http://localhost:8888" as const;
export const DEFAULT_KERNEL_NAME = "python3" as const;
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000 as const;

const num = (v: string | undefined): number | undefined => {
  if (v == null) return undefined;
  const n = Number.parseInt(v, 10);
  return Number.isFinite(n) ? n : undefined;
};

const getRuntimeOverrides = (): Partial<RuntimeSettings> => {
  const overrides = globalThis.__SPATIALNB_SETTINGS__;
  return overrides && typeof overrides === "object" ? overrides : {};
};

export const sanitizeRequestTimeout = (value: unknown): number | undefined => {
  if (typeof value !== "number") {
    return undefined;
  }
  if (!Number.isFinite(value)) {
    return undefined;
  }
  return Math.min(Math.max(Math.trunc(value), 1_000), 600_000);
};

const sanitizeString = (value: unknown): string | undefined => {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const stripTrailingSlashes = (value: string) => value.replace(/\/+$/, "");

export const RemoteServerConfigSchema = z.object({
  baseUrl: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), {
      message: "Server URL must use http or https",
    })
    .transform(stripTrailingSlashes),
  token: z
    .string()
    .optional()
    .transform((value) => sanitizeString(value)),
  name: z.string().default(""),
  requestTimeoutMs: z
    .number()
    .int()
    .min(1_000)
    .max(600_000)
    .default(DEFAULT_REQUEST_TIMEOUT_MS),
  kernelName: z.string().min(1).default(DEFAULT_KERNEL_NAME),
});
export type RemoteServerConfigInput = z.input<typeof RemoteServerConfigSchema>;

export function loadRemoteServerConfig(
  env: NodeJS.ProcessEnv | undefined = process.env,
  overrides?: Partial<RuntimeSettings>
): RemoteServerConfig {
  const resolvedEnv = env ?? process.env;
  const runtimeOverrides = {
    ...getRuntimeOverrides(),
    ...(overrides ?? {}),
  };
  const timeoutOverride = sanitizeRequestTimeout(
    runtimeOverrides.requestTimeoutMs
  );
  const envTimeout = sanitizeRequestTimeout(
    num(resolvedEnv.SPATIALNB_REQUEST_TIMEOUT_MS)
  );
  return RemoteServerConfigSchema.parse({
    baseUrl:
      sanitizeString(runtimeOverrides.serverUrl) ??
      sanitizeString(resolvedEnv.SPATIALNB_SERVER_URL) ??
      DEFAULT_SERVER_URL,
    token:
      sanitizeString(runtimeOverrides.serverToken) ??
      sanitizeString(resolvedEnv.SPATIALNB_SERVER_TOKEN),
    name: sanitizeString(resolvedEnv.SPATIALNB_SERVER_NAME) ?? "",
    requestTimeoutMs:
      timeoutOverride ?? envTimeout ?? DEFAULT_REQUEST_TIMEOUT_MS,
    kernelName:
      sanitizeString(runtimeOverrides.kernelName) ??
      sanitizeString(resolvedEnv.SPATIALNB_KERNEL_NAME) ??
      DEFAULT_KERNEL_NAME,
  }) satisfies RemoteServerConfig;
}

export function loadWorkspaceConfig(
  env: NodeJS.ProcessEnv | undefined = process.env,
  overrides?: Partial<RuntimeSettings>
): WorkspaceConfig {
  const resolvedEnv = env ?? process.env;
  const runtimeOverrides = {
    ...getRuntimeOverrides(),
    ...(overrides ?? {}),
  };
  return {
    metadataNamespace:
      sanitizeString(runtimeOverrides.metadataNamespace) ??
      sanitizeString(resolvedEnv.SPATIALNB_METADATA_NAMESPACE) ??
      DEFAULT_METADATA_NAMESPACE,
  } satisfies WorkspaceConfig;
}

/** `http(s)://host/base` → `ws(s)://host/base`. */
export const toWebSocketUrl = (baseUrl: string): string =>
  baseUrl.replace(/^http(s?):\/\//i, (_match, secure: string) =>
    secure ? "wss://" : "ws://"
  );

export { createLogger, resolveLogLevel } from "./logger.js";
export type { Logger } from "./logger.js";
export type {
  LogLevel,
  RemoteServerConfig,
  RuntimeSettings,
  WorkspaceConfig,
};
