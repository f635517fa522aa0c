export {
  RemoteSessionClient,
  type ConnectionStatus,
  type ExecutableCell,
  type ExecuteCellOptions,
  type KernelPhase,
  type RemoteClientEvent,
  type RemoteClientState,
  type RemoteSession,
  type RemoteSessionClientOptions,
} from "./client.js";
export {
  PROTOCOL_VERSION,
  WsKernelChannel,
  createWsKernelChannel,
  kernelChannelUrl,
  type ChannelExecuteRequest,
  type ChannelExecution,
  type ExecutionStatus,
  type KernelChannel,
  type KernelChannelFactory,
  type KernelChannelOptions,
} from "./channel.js";
export {
  HttpTransport,
  toRemoteError,
  type FetchLike,
  type HttpMethod,
  type HttpTransportOptions,
  type RequestOptions,
} from "./http.js";
export {
  KernelModelSchema,
  SessionModelSchema,
  encodeContentsPath,
  toNotebookEntry,
  type KernelModel,
  type RemoteNotebookEntry,
  type SessionModel,
} from "./models.js";
