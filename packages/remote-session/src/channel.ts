import WebSocket, { type RawData } from "ws";
import { nanoid } from "nanoid";
import { z } from "zod";
import {
  createLogger,
  toWebSocketUrl,
  type RemoteServerConfig,
} from "@spatialnb/config";
import {
  ConnectionError,
  NotebookOutputSchema,
  type NotebookOutput,
} from "@spatialnb/window-schema";
import type { KernelModel } from "./models.js";

const logger = createLogger("spatialnb:kernel-channel");

export const PROTOCOL_VERSION = "5.3" as const;

export type ExecutionStatus = "ok" | "error" | "aborted";

export interface ChannelExecution {
  status: ExecutionStatus;
  executionCount: number | null;
  outputs: NotebookOutput[];
}

export interface ChannelExecuteRequest {
  code: string;
  signal?: AbortSignal;
}

/** One execution stream to a running kernel. */
export interface KernelChannel {
  execute(request: ChannelExecuteRequest): Promise<ChannelExecution>;
  close(): void;
}

export interface KernelChannelOptions {
  config: RemoteServerConfig;
  kernel: KernelModel;
  sessionId: string;
  /** Receives every `execution_state` the kernel broadcasts (`busy`, `idle`, `dead`, ...). */
  onKernelStatus?: (status: string) => void;
}

export type KernelChannelFactory = (
  options: KernelChannelOptions
) => KernelChannel;

const IncomingMessageSchema = z.object({
  channel: z.string().optional(),
  header: z.object({ msg_type: z.string() }),
  parent_header: z.object({ msg_id: z.string().optional() }).catch({}),
  content: z.record(z.string(), z.unknown()).catch({}),
});
type IncomingMessage = z.infer<typeof IncomingMessageSchema>;

const ExecuteReplySchema = z.object({
  status: z.enum(["ok", "error", "aborted"]).catch("error"),
  execution_count: z.number().int().nullable().catch(null),
});

const StatusContentSchema = z.object({ execution_state: z.string() });

const OUTPUT_MESSAGE_TYPES = new Set<string>([
  "stream",
  "display_data",
  "execute_result",
  "error",
]);

interface PendingExecution {
  outputs: NotebookOutput[];
  executionCount: number | null;
  status?: ExecutionStatus;
  idle: boolean;
  resolve: (result: ChannelExecution) => void;
  reject: (error: Error) => void;
  dispose: () => void;
}

const rawToString = (data: RawData): string => {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  return data.toString("utf8");
};

export const kernelChannelUrl = (
  config: RemoteServerConfig,
  kernelId: string,
  sessionId: string
): string => {
  const url = new URL(
    `${toWebSocketUrl(config.baseUrl)}/api/kernels/${encodeURIComponent(kernelId)}/channels`
  );
  url.searchParams.set("session_id", sessionId);
  if (config.token) {
    url.searchParams.set("token", config.token);
  }
  return url.toString();
};

/**
 * Kernel channel over the notebook server's multiplexed WebSocket. The socket
 * opens on first use; closing it fails every execution still waiting.
 */
export class WsKernelChannel implements KernelChannel {
  private socket: WebSocket | null = null;
  private opening: Promise<WebSocket> | null = null;
  private connecting: {
    socket: WebSocket;
    reject: (error: ConnectionError) => void;
  } | null = null;
  private closed = false;
  private readonly pending = new Map<string, PendingExecution>();

  constructor(private readonly options: KernelChannelOptions) {}

  async execute(request: ChannelExecuteRequest): Promise<ChannelExecution> {
    if (request.signal?.aborted) {
      throw new ConnectionError("Execution was aborted");
    }
    const socket = await this.waitForOpen(request.signal);
    if (this.closed) {
      throw new ConnectionError("Kernel channel closed");
    }
    if (request.signal?.aborted) {
      throw new ConnectionError("Execution was aborted");
    }
    const msgId = nanoid();

    return new Promise<ChannelExecution>((resolve, reject) => {
      const onAbort = () => {
        this.settle(msgId);
        reject(new ConnectionError("Execution was aborted"));
      };
      request.signal?.addEventListener("abort", onAbort, { once: true });

      this.pending.set(msgId, {
        outputs: [],
        executionCount: null,
        idle: false,
        resolve,
        reject,
        dispose: () => request.signal?.removeEventListener("abort", onAbort),
      });

      const message = {
        header: {
          msg_id: msgId,
          msg_type: "execute_request",
          username: "",
          session: this.options.sessionId,
          date: new Date().toISOString(),
          version: PROTOCOL_VERSION,
        },
        parent_header: {},
        metadata: {},
        content: {
          code: request.code,
          silent: false,
          store_history: true,
          user_expressions: {},
          allow_stdin: false,
          stop_on_error: true,
        },
        channel: "shell",
        buffers: [],
      };
      socket.send(JSON.stringify(message), (error) => {
        if (error) {
          this.settle(msgId);
          reject(
            new ConnectionError("Could not send execute request", undefined, {
              cause: error,
            })
          );
        }
      });
    });
  }

  close(): void {
    this.closed = true;
    this.failPending(new ConnectionError("Kernel channel closed"));
    const connecting = this.connecting;
    this.connecting = null;
    if (connecting) {
      connecting.reject(new ConnectionError("Kernel channel closed"));
      connecting.socket.terminate();
    }
    this.socket?.close();
    this.socket = null;
    this.opening = null;
  }

  /** Waits for the socket, giving up early when `signal` aborts. */
  private waitForOpen(signal: AbortSignal | undefined): Promise<WebSocket> {
    const opening = this.open();
    if (!signal) {
      return opening;
    }
    return new Promise<WebSocket>((resolve, reject) => {
      const onAbort = () => reject(new ConnectionError("Execution was aborted"));
      signal.addEventListener("abort", onAbort, { once: true });
      void opening.then(
        (socket) => {
          signal.removeEventListener("abort", onAbort);
          resolve(socket);
        },
        (error: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(error);
        }
      );
    });
  }

  private open(): Promise<WebSocket> {
    if (this.closed) {
      return Promise.reject(new ConnectionError("Kernel channel closed"));
    }
    if (this.socket && this.socket.readyState === WebSocket.OPEN) {
      return Promise.resolve(this.socket);
    }
    if (this.opening) {
      return this.opening;
    }

    const { config, kernel, sessionId } = this.options;
    const headers: Record<string, string> = {};
    if (config.token) {
      headers.Authorization = `Bearer ${config.token}`;
    }
    const socket = new WebSocket(kernelChannelUrl(config, kernel.id, sessionId), {
      headers,
      handshakeTimeout: config.requestTimeoutMs,
    });

    const opening = new Promise<WebSocket>((resolve, reject) => {
      const onError = (error: Error) => {
        if (this.connecting?.socket === socket) {
          this.connecting = null;
          this.opening = null;
        }
        reject(
          new ConnectionError(
            this.closed
              ? "Kernel channel closed"
              : `Could not open kernel channel for ${kernel.id}`,
            undefined,
            { cause: error }
          )
        );
      };
      socket.once("error", onError);
      socket.once("open", () => {
        socket.off("error", onError);
        socket.on("error", (error) => {
          logger.warn({ kernelId: kernel.id, err: error }, "Kernel channel error");
        });
        this.connecting = null;
        this.opening = null;
        this.socket = socket;
        resolve(socket);
      });
      this.connecting = { socket, reject };
    });

    socket.on("message", (data) => this.handleMessage(rawToString(data)));
    socket.on("close", () => {
      if (this.socket === socket) {
        this.socket = null;
      }
      this.failPending(new ConnectionError("Kernel channel closed"));
    });

    this.opening = opening;
    return opening;
  }

  private handleMessage(text: string) {
    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      logger.debug({ err: error }, "Ignoring non-JSON kernel message");
      return;
    }
    const parsed = IncomingMessageSchema.safeParse(value);
    if (!parsed.success) {
      return;
    }
    const message = parsed.data;

    if (message.header.msg_type === "status") {
      const status = StatusContentSchema.safeParse(message.content);
      if (status.success) {
        this.options.onKernelStatus?.(status.data.execution_state);
      }
    }

    const parentId = message.parent_header.msg_id;
    const execution = parentId ? this.pending.get(parentId) : undefined;
    if (!parentId || !execution) {
      return;
    }
    this.applyMessage(parentId, execution, message);
  }

  private applyMessage(
    msgId: string,
    execution: PendingExecution,
    message: IncomingMessage
  ) {
    const type = message.header.msg_type;
    if (type === "status") {
      const status = StatusContentSchema.safeParse(message.content);
      if (status.success && status.data.execution_state === "idle") {
        execution.idle = true;
      }
    } else if (type === "execute_input") {
      const count = message.content.execution_count;
      if (typeof count === "number") {
        execution.executionCount = count;
      }
    } else if (type === "clear_output") {
      execution.outputs = [];
    } else if (OUTPUT_MESSAGE_TYPES.has(type)) {
      const output = NotebookOutputSchema.safeParse({
        ...message.content,
        output_type: type,
      });
      if (output.success) {
        execution.outputs.push(output.data);
      } else {
        logger.debug({ msgType: type }, "Dropping malformed output message");
      }
    } else if (type === "execute_reply") {
      const reply = ExecuteReplySchema.parse(message.content);
      execution.status = reply.status;
      execution.executionCount =
        reply.execution_count ?? execution.executionCount;
    }

    if (execution.status && execution.idle) {
      this.settle(msgId);
      execution.resolve({
        status: execution.status,
        executionCount: execution.executionCount,
        outputs: execution.outputs,
      });
    }
  }

  private settle(msgId: string) {
    const execution = this.pending.get(msgId);
    if (execution) {
      execution.dispose();
      this.pending.delete(msgId);
    }
  }

  private failPending(error: ConnectionError) {
    const executions = [...this.pending.values()];
    this.pending.clear();
    for (const execution of executions) {
      execution.dispose();
      execution.reject(error);
    }
  }
}

export const createWsKernelChannel: KernelChannelFactory = (options) =>
  new WsKernelChannel(options);
