import { EventEmitter } from "node:events";
import { nanoid } from "nanoid";
import { z } from "zod";
import {
  RemoteServerConfigSchema,
  createLogger,
  type RemoteServerConfig,
  type RemoteServerConfigInput,
} from "@spatialnb/config";
import {
  ConnectionError,
  DocumentParseError,
  ExecutionFailure,
  KernelUnavailable,
  NotebookDocumentSchema,
  describeError,
  fail,
  joinCellSource,
  succeed,
  type NotebookDocument,
  type NotebookOutput,
  type Outcome,
  type RemoteError,
} from "@spatialnb/window-schema";
import {
  createWsKernelChannel,
  type ChannelExecution,
  type KernelChannel,
  type KernelChannelFactory,
} from "./channel.js";
import { HttpTransport, toRemoteError, type FetchLike } from "./http.js";
import {
  ContentsEntrySchema,
  DirectoryContentsSchema,
  KernelListSchema,
  KernelModelSchema,
  NotebookContentsSchema,
  SessionModelSchema,
  encodeContentsPath,
  toNotebookEntry,
  type KernelModel,
  type RemoteNotebookEntry,
  type SessionModel,
} from "./models.js";

const logger = createLogger("spatialnb:remote-session");

export type ConnectionStatus = "disconnected" | "connecting" | "connected";
export type KernelPhase = "none" | "starting" | "running" | "stopping";

/** Execution state for one cell. Lives only as long as the client. */
export interface RemoteSession {
  cellId: string;
  isExecuting: boolean;
  executionCount: number;
  outputs: NotebookOutput[];
  error?: RemoteError;
  abandoned: boolean;
}

export interface RemoteClientState {
  connectionStatus: ConnectionStatus;
  isConnecting: boolean;
  connectionError?: RemoteError;
  server?: { baseUrl: string; name: string };
  notebooks: RemoteNotebookEntry[];
  kernels: KernelModel[];
  kernelPhase: KernelPhase;
  activeKernel?: KernelModel;
}

export type RemoteClientEvent =
  | { type: "connection"; state: RemoteClientState }
  | { type: "kernel"; phase: KernelPhase; kernel?: KernelModel }
  | { type: "notebooks"; notebooks: RemoteNotebookEntry[] }
  | { type: "session"; session: RemoteSession };

export interface ExecutableCell {
  id: string;
  source: string | readonly string[];
}

export interface ExecuteCellOptions {
  /** Keep earlier outputs and add the new ones after them. */
  appendOutputs?: boolean;
}

export interface RemoteSessionClientOptions {
  fetch?: FetchLike;
  channelFactory?: KernelChannelFactory;
}

interface ConnectionContext {
  attempt: number;
  config: RemoteServerConfig;
  transport: HttpTransport;
  controller: AbortController;
}

interface RunningExecution {
  kernelId: string;
  controller: AbortController;
}

const EmptyReplySchema = z.unknown();

const contentsPath = (path: string) => {
  const encoded = encodeContentsPath(path);
  return encoded ? `/api/contents/${encoded}` : "/api/contents";
};

const kernelPath = (kernelId: string) =>
  `/api/kernels/${encodeURIComponent(kernelId)}`;

const basename = (path: string) => path.split("/").filter(Boolean).pop() ?? path;

const copySession = (session: RemoteSession): RemoteSession => ({
  ...session,
  outputs: [...session.outputs],
});

const NOT_CONNECTED = "Not connected to a notebook server";

/**
 * Client for a remote notebook server: browsing, kernel lifecycle and cell
 * execution. Public operations resolve with an {@link Outcome} or update
 * observable state; they do not reject.
 */
export class RemoteSessionClient {
  private readonly events = new EventEmitter();
  private readonly fetchImpl?: FetchLike;
  private readonly channelFactory: KernelChannelFactory;
  private readonly clientSessionId = nanoid();

  private attempt = 0;
  private connection: ConnectionContext | null = null;
  private connectionStatus: ConnectionStatus = "disconnected";
  private connectionError: RemoteError | undefined;
  private server: { baseUrl: string; name: string } | undefined;
  private notebooks: RemoteNotebookEntry[] = [];
  private kernels: KernelModel[] = [];
  private kernelPhase: KernelPhase = "none";
  private activeKernel: KernelModel | undefined;
  private notebookSessionId: string | undefined;

  private starting: Promise<Outcome<KernelModel>> | null = null;
  private readonly stopping = new Map<string, Promise<Outcome<void>>>();
  private readonly channels = new Map<string, KernelChannel>();
  private readonly sessions = new Map<string, RemoteSession>();
  private readonly running = new Map<string, RunningExecution>();
  private disposed = false;

  constructor(options: RemoteSessionClientOptions = {}) {
    this.fetchImpl = options.fetch;
    this.channelFactory = options.channelFactory ?? createWsKernelChannel;
  }

  getState(): RemoteClientState {
    return {
      connectionStatus: this.connectionStatus,
      isConnecting: this.connectionStatus === "connecting",
      ...(this.connectionError ? { connectionError: this.connectionError } : {}),
      ...(this.server ? { server: { ...this.server } } : {}),
      notebooks: this.notebooks.map((entry) => ({ ...entry })),
      kernels: this.kernels.map((kernel) => ({ ...kernel })),
      kernelPhase: this.kernelPhase,
      ...(this.activeKernel ? { activeKernel: { ...this.activeKernel } } : {}),
    };
  }

  subscribe(listener: (event: RemoteClientEvent) => void): () => void {
    this.events.on("change", listener);
    return () => {
      this.events.off("change", listener);
    };
  }

  /**
   * Checks the server with the given configuration. A later call supersedes
   * one still in flight; the superseded attempt leaves state alone.
   */
  async connect(input: RemoteServerConfigInput): Promise<Outcome<void>> {
    const attempt = ++this.attempt;
    this.teardownConnection();

    const parsed = RemoteServerConfigSchema.safeParse(input);
    if (!parsed.success) {
      const error = new ConnectionError(
        `Invalid server configuration: ${parsed.error.issues
          .map((issue) => issue.message)
          .join("; ")}`,
        undefined,
        { cause: parsed.error }
      );
      this.connectionStatus = "disconnected";
      this.connectionError = error;
      this.emitConnection();
      return fail(error);
    }

    const config = parsed.data;
    const controller = new AbortController();
    const context: ConnectionContext = {
      attempt,
      config,
      controller,
      transport: new HttpTransport({
        config,
        signal: controller.signal,
        ...(this.fetchImpl ? { fetch: this.fetchImpl } : {}),
      }),
    };
    this.connection = context;
    this.connectionStatus = "connecting";
    this.connectionError = undefined;
    this.server = { baseUrl: config.baseUrl, name: config.name };
    this.emitConnection();

    try {
      const kernels = await context.transport.request(
        "GET",
        "/api/kernels",
        KernelListSchema
      );
      if (!this.isCurrent(context)) {
        return fail(new ConnectionError("Connection attempt was superseded"));
      }
      this.kernels = kernels;
      this.connectionStatus = "connected";
      this.emitConnection();
      logger.info(
        { baseUrl: config.baseUrl, kernels: kernels.length },
        "Connected to notebook server"
      );
      return succeed(undefined);
    } catch (caught) {
      const error = toRemoteError(caught);
      if (!this.isCurrent(context)) {
        return fail(error);
      }
      this.connection = null;
      this.connectionStatus = "disconnected";
      this.connectionError = error;
      this.emitConnection();
      logger.warn({ baseUrl: config.baseUrl, err: error }, "Connection failed");
      return fail(error);
    }
  }

  disconnect(): void {
    this.attempt += 1;
    this.teardownConnection();
    this.connectionStatus = "disconnected";
    this.connectionError = undefined;
    this.emitConnection();
  }

  /** Lists the notebooks in a server directory; the cached list only changes on success. */
  async listNotebooks(path = ""): Promise<Outcome<RemoteNotebookEntry[]>> {
    return this.run(async ({ transport }) => {
      const directory = await transport.request(
        "GET",
        contentsPath(path),
        DirectoryContentsSchema,
        { query: { content: "1" } }
      );
      const notebooks = directory.content
        .filter((entry) => entry.type === "notebook")
        .map(toNotebookEntry)
        .sort((a, b) => a.path.localeCompare(b.path));
      this.notebooks = notebooks;
      this.emit({
        type: "notebooks",
        notebooks: notebooks.map((entry) => ({ ...entry })),
      });
      return notebooks.map((entry) => ({ ...entry }));
    });
  }

  async fetchNotebook(path: string): Promise<Outcome<NotebookDocument>> {
    return this.run(async ({ transport }) => {
      const contents = await transport.request(
        "GET",
        contentsPath(path),
        NotebookContentsSchema,
        { query: { content: "1", type: "notebook" } }
      );
      const document = NotebookDocumentSchema.safeParse(contents.content);
      if (!document.success) {
        throw new DocumentParseError(
          `'${path}' is not a valid notebook document`,
          { cause: document.error }
        );
      }
      return document.data;
    });
  }

  async saveNotebook(
    path: string,
    document: NotebookDocument
  ): Promise<Outcome<RemoteNotebookEntry>> {
    return this.run(async ({ transport }) => {
      const entry = await transport.request(
        "PUT",
        contentsPath(path),
        ContentsEntrySchema,
        { body: { type: "notebook", format: "json", content: document } }
      );
      return toNotebookEntry(entry);
    });
  }

  /** Refreshes the kernel list and notices when the active kernel is gone. */
  async loadKernels(): Promise<Outcome<KernelModel[]>> {
    return this.run(async ({ transport }) => {
      const kernels = await transport.request(
        "GET",
        "/api/kernels",
        KernelListSchema
      );
      this.kernels = kernels;
      const active = this.activeKernel;
      if (
        active &&
        this.kernelPhase === "running" &&
        !kernels.some((kernel) => kernel.id === active.id)
      ) {
        this.handleKernelLoss(active.id);
      }
      return kernels.map((kernel) => ({ ...kernel }));
    });
  }

  /**
   * Starts a kernel, or returns the running one. Calls made while a start
   * is in flight share its result.
   */
  async startKernel(name?: string): Promise<Outcome<KernelModel>> {
    if (this.kernelPhase === "running" && this.activeKernel) {
      return succeed({ ...this.activeKernel });
    }
    if (this.starting) {
      return this.starting;
    }
    if (this.kernelPhase === "stopping") {
      return fail(new KernelUnavailable("The active kernel is stopping"));
    }
    const flight = this.launchKernel(name);
    this.starting = flight;
    try {
      return await flight;
    } finally {
      if (this.starting === flight) {
        this.starting = null;
      }
    }
  }

  /** Opens (or joins) the server session for a notebook and adopts its kernel. */
  async ensureNotebookSession(path: string): Promise<Outcome<SessionModel>> {
    if (this.starting) {
      await this.starting;
    }
    if (this.kernelPhase === "stopping") {
      return fail(new KernelUnavailable("The active kernel is stopping"));
    }
    return this.run(async (context) => {
      const active = this.activeKernel;
      const session = await context.transport.request(
        "POST",
        "/api/sessions",
        SessionModelSchema,
        {
          body: {
            path,
            name: basename(path),
            type: "notebook",
            kernel: active
              ? { id: active.id }
              : { name: context.config.kernelName },
          },
        }
      );
      if (this.isCurrent(context)) {
        this.notebookSessionId = session.id;
        this.adoptKernel(session.kernel);
      }
      return session;
    });
  }

  async stopKernel(kernel: KernelModel | string): Promise<Outcome<void>> {
    const kernelId = typeof kernel === "string" ? kernel : kernel.id;
    const inFlight = this.stopping.get(kernelId);
    if (inFlight) {
      return inFlight;
    }
    const flight = this.shutdownKernel(kernelId);
    this.stopping.set(kernelId, flight);
    try {
      return await flight;
    } finally {
      if (this.stopping.get(kernelId) === flight) {
        this.stopping.delete(kernelId);
      }
    }
  }

  async interruptKernel(kernel: KernelModel | string): Promise<Outcome<void>> {
    const kernelId = typeof kernel === "string" ? kernel : kernel.id;
    return this.run(async ({ transport }) => {
      await transport.request(
        "POST",
        `${kernelPath(kernelId)}/interrupt`,
        EmptyReplySchema
      );
    });
  }

  /**
   * Runs a cell on `kernel`, which must be the client's running kernel.
   * `isExecuting` is raised before anything else and always cleared.
   */
  async executeCell(
    cell: ExecutableCell,
    kernel: KernelModel | string,
    options: ExecuteCellOptions = {}
  ): Promise<Outcome<RemoteSession>> {
    const session = this.sessionFor(cell.id);
    session.isExecuting = true;
    session.abandoned = false;
    session.error = undefined;
    if (!options.appendOutputs) {
      session.outputs = [];
    }
    this.emitSession(session);

    const kernelId = typeof kernel === "string" ? kernel : kernel.id;
    const controller = new AbortController();
    try {
      const context = this.connection;
      const active = this.activeKernel;
      if (
        !context ||
        this.connectionStatus !== "connected" ||
        this.kernelPhase !== "running" ||
        !active ||
        active.id !== kernelId
      ) {
        throw new KernelUnavailable();
      }
      this.running.set(cell.id, { kernelId, controller });
      const result = await this.channelFor(context, active).execute({
        code: joinCellSource(cell.source),
        signal: controller.signal,
      });
      session.outputs = [...session.outputs, ...result.outputs];
      const failure = executionFailure(result);
      if (failure) {
        throw failure;
      }
      session.executionCount += 1;
      return succeed(copySession(session));
    } catch (caught) {
      const error = toRemoteError(caught);
      session.error = error;
      logger.debug({ cellId: cell.id, err: error }, "Cell execution failed");
      return fail(error);
    } finally {
      if (this.running.get(cell.id)?.controller === controller) {
        this.running.delete(cell.id);
      }
      session.isExecuting = false;
      this.emitSession(session);
    }
  }

  getSession(cellId: string): RemoteSession | undefined {
    const session = this.sessions.get(cellId);
    return session ? copySession(session) : undefined;
  }

  listSessions(): RemoteSession[] {
    return [...this.sessions.values()].map(copySession);
  }

  /** Cancels a running execution and marks the session abandoned. */
  abandonSession(cellId: string): boolean {
    const session = this.sessions.get(cellId);
    if (!session) {
      return false;
    }
    const execution = this.running.get(cellId);
    if (session.isExecuting || execution) {
      session.abandoned = true;
      execution?.controller.abort();
      this.running.delete(cellId);
      this.emitSession(session);
    }
    return true;
  }

  disposeSession(cellId: string): boolean {
    this.abandonSession(cellId);
    return this.sessions.delete(cellId);
  }

  /** Tears everything down; executions still running end up abandoned. */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    for (const cellId of [...this.sessions.keys()]) {
      this.abandonSession(cellId);
    }
    this.attempt += 1;
    this.teardownConnection();
    this.connectionStatus = "disconnected";
    this.emitConnection();
    this.events.removeAllListeners();
  }

  private async launchKernel(name?: string): Promise<Outcome<KernelModel>> {
    const context = this.connection;
    if (!context || this.connectionStatus !== "connected") {
      return fail(new ConnectionError(NOT_CONNECTED));
    }
    this.setKernelPhase("starting");
    try {
      const kernel = await context.transport.request(
        "POST",
        "/api/kernels",
        KernelModelSchema,
        { body: { name: name ?? context.config.kernelName } }
      );
      if (!this.isCurrent(context)) {
        return fail(new ConnectionError("Connection was replaced"));
      }
      this.adoptKernel(kernel);
      logger.info({ kernelId: kernel.id, name: kernel.name }, "Kernel started");
      return succeed({ ...kernel });
    } catch (caught) {
      const error = toRemoteError(caught);
      if (this.isCurrent(context)) {
        this.setKernelPhase("none");
      }
      logger.warn({ err: error }, "Kernel start failed");
      return fail(error);
    }
  }

  private async shutdownKernel(kernelId: string): Promise<Outcome<void>> {
    const context = this.connection;
    if (!context || this.connectionStatus !== "connected") {
      return fail(new ConnectionError(NOT_CONNECTED));
    }
    const isActive = this.activeKernel?.id === kernelId;
    if (isActive) {
      this.setKernelPhase("stopping");
    }
    try {
      await context.transport.request(
        "DELETE",
        kernelPath(kernelId),
        EmptyReplySchema
      );
      if (this.isCurrent(context)) {
        this.closeChannel(kernelId);
        this.kernels = this.kernels.filter((kernel) => kernel.id !== kernelId);
        if (this.activeKernel?.id === kernelId) {
          this.activeKernel = undefined;
          this.setKernelPhase("none");
        }
      }
      logger.info({ kernelId }, "Kernel stopped");
      return succeed(undefined);
    } catch (caught) {
      const error = toRemoteError(caught);
      if (
        this.isCurrent(context) &&
        isActive &&
        this.activeKernel?.id === kernelId
      ) {
        this.setKernelPhase("running");
      }
      logger.warn({ kernelId, err: error }, "Kernel stop failed");
      return fail(error);
    }
  }

  private async run<T>(
    task: (context: ConnectionContext) => Promise<T>
  ): Promise<Outcome<T>> {
    const context = this.connection;
    if (!context || this.connectionStatus !== "connected") {
      return fail(new ConnectionError(NOT_CONNECTED));
    }
    try {
      return succeed(await task(context));
    } catch (caught) {
      const error = toRemoteError(caught);
      logger.warn({ err: error }, describeError(error));
      return fail(error);
    }
  }

  private adoptKernel(kernel: KernelModel) {
    if (this.activeKernel && this.activeKernel.id !== kernel.id) {
      this.closeChannel(this.activeKernel.id);
    }
    this.activeKernel = kernel;
    if (!this.kernels.some((entry) => entry.id === kernel.id)) {
      this.kernels = [...this.kernels, kernel];
    }
    this.setKernelPhase("running");
  }

  private handleKernelStatus(kernelId: string, status: string) {
    if (status === "dead") {
      this.handleKernelLoss(kernelId);
    }
  }

  private handleKernelLoss(kernelId: string) {
    logger.warn({ kernelId }, "Kernel is no longer available");
    this.closeChannel(kernelId);
    this.kernels = this.kernels.filter((kernel) => kernel.id !== kernelId);
    if (this.activeKernel?.id === kernelId) {
      this.activeKernel = undefined;
      this.setKernelPhase("none");
    }
  }

  private channelFor(
    context: ConnectionContext,
    kernel: KernelModel
  ): KernelChannel {
    const existing = this.channels.get(kernel.id);
    if (existing) {
      return existing;
    }
    const channel = this.channelFactory({
      config: context.config,
      kernel,
      sessionId: this.notebookSessionId ?? this.clientSessionId,
      onKernelStatus: (status) => this.handleKernelStatus(kernel.id, status),
    });
    this.channels.set(kernel.id, channel);
    return channel;
  }

  private closeChannel(kernelId: string) {
    const channel = this.channels.get(kernelId);
    if (channel) {
      this.channels.delete(kernelId);
      channel.close();
    }
  }

  private teardownConnection() {
    const previous = this.connection;
    this.connection = null;
    previous?.controller.abort();
    for (const [cellId, execution] of [...this.running]) {
      const session = this.sessions.get(cellId);
      if (session) {
        session.abandoned = true;
      }
      execution.controller.abort();
    }
    this.running.clear();
    for (const kernelId of [...this.channels.keys()]) {
      this.closeChannel(kernelId);
    }
    this.notebooks = [];
    this.kernels = [];
    this.activeKernel = undefined;
    this.notebookSessionId = undefined;
    this.starting = null;
    this.stopping.clear();
    if (this.kernelPhase !== "none") {
      this.setKernelPhase("none");
    }
  }

  private isCurrent(context: ConnectionContext) {
    return this.connection === context && context.attempt === this.attempt;
  }

  private sessionFor(cellId: string): RemoteSession {
    let session = this.sessions.get(cellId);
    if (!session) {
      session = {
        cellId,
        isExecuting: false,
        executionCount: 0,
        outputs: [],
        abandoned: false,
      };
      this.sessions.set(cellId, session);
    }
    return session;
  }

  private setKernelPhase(phase: KernelPhase) {
    this.kernelPhase = phase;
    this.emit({
      type: "kernel",
      phase,
      ...(this.activeKernel ? { kernel: { ...this.activeKernel } } : {}),
    });
  }

  private emitConnection() {
    this.emit({ type: "connection", state: this.getState() });
  }

  private emitSession(session: RemoteSession) {
    this.emit({ type: "session", session: copySession(session) });
  }

  private emit(event: RemoteClientEvent) {
    this.events.emit("change", event);
  }
}

const executionFailure = (
  result: ChannelExecution
): ExecutionFailure | undefined => {
  if (result.status === "ok") {
    return undefined;
  }
  if (result.status === "aborted") {
    return new ExecutionFailure(
      "ExecutionAborted",
      "The kernel aborted the request"
    );
  }
  const output = result.outputs.find(
    (candidate) => candidate.output_type === "error"
  );
  return output && output.output_type === "error"
    ? new ExecutionFailure(output.ename, output.evalue)
    : new ExecutionFailure("ExecutionError", "The kernel reported an error");
};
