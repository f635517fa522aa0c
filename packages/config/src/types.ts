export type LogLevel =
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace"
  | "silent";

export interface RemoteServerConfig {
  baseUrl: string;
  token?: string;
  name: string;
  requestTimeoutMs: number;
  kernelName: string;
}

export interface WorkspaceConfig {
  metadataNamespace: string;
}

export interface RuntimeSettings {
  serverUrl?: string;
  serverToken?: string;
  requestTimeoutMs?: number;
  kernelName?: string;
  metadataNamespace?: string;
  [key: string]: unknown;
}
