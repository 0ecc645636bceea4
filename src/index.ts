export * from './client/index.js';
export {
  AppError,
  MalformedEventError,
  MissingSessionIdError,
  NoSessionError,
  SessionCreationError,
  TransportError,
  ValidationError,
} from './types/index.js';
export type {
  ClientAuth,
  ClientInfo,
  ClientOptions,
  HealthStatus,
  JsonRpcErrorObject,
  JsonRpcId,
  JsonRpcMessage,
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcResponse,
  SessionId,
  SseEvent,
  VersionInfo,
} from './types/index.js';
export {
  Logger,
  LogLevel,
  LogTarget,
  createChildLogger,
  setLogLevel,
} from './utils/logger.js';
