export type {
  JsonRpcId,
  JsonRpcRequest,
  JsonRpcNotification,
  JsonRpcResponse,
  JsonRpcErrorObject,
  JsonRpcMessage,
} from './jsonrpc.js';

export type SessionId = string;

export interface ClientInfo {
  readonly name: string;
  readonly version: string;
}

export interface ClientAuth {
  /** Sent as `Authorization: Bearer <token>` */
  readonly bearerToken?: string | undefined;
  /** Value of the proxy's `session_id` cookie from a completed OIDC login */
  readonly sessionCookie?: string | undefined;
}

export interface ClientOptions {
  readonly baseUrl: string;
  readonly auth?: ClientAuth | undefined;
  readonly clientInfo?: ClientInfo | undefined;
  readonly protocolVersion?: string | undefined;
}

/**
 * A single decoded server-sent event
 */
export interface SseEvent {
  readonly event: string;
  readonly data: string;
  readonly id?: string | undefined;
  /** Decoded `data` when it holds valid JSON */
  readonly json?: unknown;
  readonly parseError?: MalformedEventError | undefined;
}

export interface HealthStatus {
  status: string;
  version: string;
  uptime: number;
  backend_status: string;
}

export interface VersionInfo {
  version: string;
  git_commit: string;
  build_date: string;
  go_version: string;
  platform: string;
}

/**
 * Base error class for all application errors
 */
export abstract class AppError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;

    // Maintain proper stack trace for where our error was thrown (V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error thrown when input validation fails
 */
export class ValidationError extends AppError {
  readonly code = 'VALIDATION_ERROR';

  constructor(message: string) {
    super(`Validation error: ${message}`);
  }
}

export class SessionCreationError extends AppError {
  readonly code = 'SESSION_CREATION_FAILED';

  constructor(reason: string) {
    super(`Failed to create session: ${reason}`);
  }
}

export class NoSessionError extends AppError {
  readonly code = 'NO_SESSION';

  constructor() {
    super('No session created. Call createSession() or openStream() first.');
  }
}

export class MissingSessionIdError extends AppError {
  readonly code = 'MISSING_SESSION_ID';

  constructor(url: string) {
    super(`No session ID received from server (${url})`);
  }
}

export interface TransportErrorDetails {
  readonly method: string;
  readonly url: string;
  readonly status?: number | undefined;
  readonly body?: string | undefined;
  readonly cause?: unknown;
}

export class TransportError extends AppError {
  readonly code = 'TRANSPORT_ERROR';
  readonly method: string;
  readonly url: string;
  readonly status: number | undefined;
  readonly body: string | undefined;

  constructor(message: string, details: TransportErrorDetails) {
    super(`${details.method} ${details.url} failed: ${message}`);
    this.method = details.method;
    this.url = details.url;
    this.status = details.status;
    this.body = details.body;
    if (details.cause !== undefined) {
      this.cause = details.cause;
    }
  }
}

/**
 * Attached to an SSE event whose data is not valid JSON; never thrown by the
 * decoder itself
 */
export class MalformedEventError extends AppError {
  readonly code = 'MALFORMED_EVENT';
  readonly eventName: string;
  readonly data: string;

  constructor(eventName: string, data: string, reason: string) {
    super(`Event "${eventName}" carries malformed JSON data: ${reason}`);
    this.eventName = eventName;
    this.data = data;
  }
}
