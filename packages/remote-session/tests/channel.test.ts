import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { once } from "node:events";
import WebSocket, { WebSocketServer } from "ws";
import { z } from "zod";
import { ConnectionError } from "@spatialnb/window-schema";
import {
  WsKernelChannel,
  kernelChannelUrl,
  type KernelModel,
} from "../src/index.js";

const KERNEL: KernelModel = { id: "kernel-1", name: "python3" };

const ExecuteRequestSchema = z.object({
  channel: z.string(),
  header: z.object({
    msg_id: z.string(),
    msg_type: z.string(),
    session: z.string(),
    version: z.string(),
  }),
  content: z.object({ code: z.string() }),
});

const send = (
  socket: WebSocket,
  parentId: string,
  msgType: string,
  content: Record<string, unknown>,
  channel = "iopub"
) => {
  socket.send(
    JSON.stringify({
      channel,
      header: { msg_id: `${parentId}:${msgType}`, msg_type: msgType },
      parent_header: { msg_id: parentId },
      metadata: {},
      content,
    })
  );
};

// Scripted kernel: the code text picks the reply sequence.
const respond = (socket: WebSocket, msgId: string, code: string) => {
  send(socket, msgId, "status", { execution_state: "busy" });
  if (code === "hang") {
    return;
  }
  if (code === "die") {
    send(socket, "other", "status", { execution_state: "dead" });
    socket.close();
    return;
  }
  send(socket, msgId, "execute_input", { code, execution_count: 3 });
  if (code === "fail") {
    send(socket, msgId, "error", {
      ename: "NameError",
      evalue: "name 'y' is not defined",
      traceback: ["NameError"],
    });
    send(socket, msgId, "execute_reply", { status: "error", execution_count: 3 }, "shell");
  } else if (code === "clear") {
    send(socket, msgId, "stream", { name: "stdout", text: "a" });
    send(socket, msgId, "clear_output", { wait: false });
    send(socket, msgId, "stream", { name: "stdout", text: "b" });
    send(socket, msgId, "execute_reply", { status: "ok", execution_count: 3 }, "shell");
  } else {
    send(socket, msgId, "stream", { name: "stdout", text: "hello\n" });
    send(socket, "unrelated", "stream", { name: "stdout", text: "noise" });
    send(socket, msgId, "execute_result", {
      data: { "text/plain": "42" },
      metadata: {},
      execution_count: 3,
    });
    send(socket, msgId, "execute_reply", { status: "ok", execution_count: 3 }, "shell");
  }
  send(socket, msgId, "status", { execution_state: "idle" });
};

describe("@spatialnb/remote-session – WsKernelChannel", () => {
  let server: WebSocketServer;
  let baseUrl: string;
  let upgrades: { url: string; authorization: string | undefined }[];
  let requests: z.infer<typeof ExecuteRequestSchema>[];
  let channel: WsKernelChannel | undefined;

  beforeEach(async () => {
    upgrades = [];
    requests = [];
    server = new WebSocketServer({ port: 0 });
    server.on("connection", (socket, request) => {
      upgrades.push({
        url: request.url ?? "",
        authorization: request.headers.authorization,
      });
      socket.on("message", (data) => {
        const message = ExecuteRequestSchema.parse(JSON.parse(data.toString()));
        requests.push(message);
        respond(socket, message.header.msg_id, message.content.code);
      });
    });
    await once(server, "listening");
    const address = server.address();
    if (typeof address === "string") {
      throw new Error(`Unexpected server address ${address}`);
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    channel?.close();
    channel = undefined;
    for (const client of server.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  const openChannel = (onKernelStatus?: (status: string) => void) => {
    channel = new WsKernelChannel({
      config: {
        baseUrl,
        token: "test-secret",
        name: "",
        requestTimeoutMs: 5_000,
        kernelName: "python3",
      },
      kernel: KERNEL,
      sessionId: "session-1",
      ...(onKernelStatus ? { onKernelStatus } : {}),
    });
    return channel;
  };

  it("builds the channels URL with session and token", () => {
    expect(
      kernelChannelUrl(
        {
          baseUrl: "https://lab.example.com/user/a",
          token: "test-secret",
          name: "",
          requestTimeoutMs: 5_000,
          kernelName: "python3",
        },
        "k 1",
        "s1"
      )
    ).toBe(
      "wss://lab.example.com/user/a/api/kernels/k%201/channels?session_id=s1&token=test-secret"
    );
  });

  it("sends an execute request and collects its outputs", async () => {
    const statuses: string[] = [];
    const result = await openChannel((status) => statuses.push(status)).execute({
      code: "6 * 7",
    });

    expect(result).toEqual({
      status: "ok",
      executionCount: 3,
      outputs: [
        { output_type: "stream", name: "stdout", text: "hello\n" },
        {
          output_type: "execute_result",
          data: { "text/plain": "42" },
          metadata: {},
          execution_count: 3,
        },
      ],
    });
    expect(statuses).toEqual(["busy", "idle"]);
    expect(upgrades).toEqual([
      {
        url: "/api/kernels/kernel-1/channels?session_id=session-1&token=test-secret",
        authorization: "Bearer test-secret",
      },
    ]);
    expect(requests[0]?.channel).toBe("shell");
    expect(requests[0]?.header.msg_type).toBe("execute_request");
    expect(requests[0]?.header.session).toBe("session-1");
    expect(requests[0]?.header.version).toBe("5.3");
  });

  it("reuses one socket for consecutive executions", async () => {
    const kernel = openChannel();
    await kernel.execute({ code: "1" });
    await kernel.execute({ code: "2" });
    expect(upgrades).toHaveLength(1);
    expect(requests.map((request) => request.content.code)).toEqual(["1", "2"]);
  });

  it("drops outputs before a clear_output", async () => {
    const result = await openChannel().execute({ code: "clear" });
    expect(result.outputs).toEqual([
      { output_type: "stream", name: "stdout", text: "b" },
    ]);
  });

  it("reports error replies with the error output", async () => {
    const result = await openChannel().execute({ code: "fail" });
    expect(result.status).toBe("error");
    expect(result.outputs).toEqual([
      {
        output_type: "error",
        ename: "NameError",
        evalue: "name 'y' is not defined",
        traceback: ["NameError"],
      },
    ]);
  });

  it("fails pending executions when the kernel dies", async () => {
    const statuses: string[] = [];
    const pending = openChannel((status) => statuses.push(status)).execute({
      code: "die",
    });
    await expect(pending).rejects.toThrow("Kernel channel closed");
    expect(statuses).toEqual(["busy", "dead"]);
  });

  it("rejects an execution when its signal aborts", async () => {
    const controller = new AbortController();
    const kernel = openChannel();
    const pending = kernel.execute({ code: "hang", signal: controller.signal });
    await new Promise<void>((resolve) => {
      const check = () => (requests.length > 0 ? resolve() : setTimeout(check, 5));
      check();
    });
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(ConnectionError);
  });

  it("stops opening the socket when closed mid-handshake", async () => {
    const kernel = openChannel();
    const pending = kernel.execute({ code: "hang" });
    kernel.close();
    await expect(pending).rejects.toThrow("Kernel channel closed");
    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(requests).toEqual([]);
  });

  it("does not send an execution aborted while the socket opens", async () => {
    const controller = new AbortController();
    const kernel = openChannel();
    const pending = kernel.execute({ code: "hang", signal: controller.signal });
    controller.abort();
    await expect(pending).rejects.toThrow("Execution was aborted");
    await new Promise<void>((resolve) => {
      const check = () => (upgrades.length > 0 ? resolve() : setTimeout(check, 5));
      check();
    });
    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(requests).toEqual([]);
  });

  it("refuses work after close", async () => {
    const kernel = openChannel();
    kernel.close();
    await expect(kernel.execute({ code: "1" })).rejects.toThrow(
      "Kernel channel closed"
    );
  });
});
