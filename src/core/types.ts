/** Where a response has to go: the channel the command came from and, optionally, who sent it. */
export interface ReplyContext {
  channelId: string;
  userId?: string;
  displayName?: string;
}

/** One inbound command invocation, frozen once read off the wire. */
export interface CommandEnvelope {
  readonly correlationId: string;
  readonly command: string;
  readonly args: readonly string[];
  readonly rawArgs: string;
  readonly context: Readonly<ReplyContext>;
  readonly receivedAt: number;
}

export type ErrorCode =
  | 'unknown-command'
  | 'bad-arguments'
  | 'rate-limited'
  | 'upstream-unavailable'
  | 'timeout'
  | 'internal';

export interface StructuredError {
  code: ErrorCode;
  message: string;
}

export type ResponsePayload =
  | { kind: 'ok'; lines: string[] }
  | { kind: 'error'; error: StructuredError };

export interface ResponseEnvelope {
  readonly correlationId: string;
  readonly context: Readonly<ReplyContext>;
  readonly payload: ResponsePayload;
  readonly emittedAt: number;
}

/** Command metadata advertised to the core when the event stream is opened. */
export interface CommandRegistration {
  name: string;
  shortHelp: string;
  fullHelp: string;
}

/** Command event as decoded from the wire, before the session assigns a correlation id. */
export interface InboundCommand {
  command: string;
  arg: string;
  context: ReplyContext;
}

/** Per-instance session state; transitions only move forward. */
export enum SessionState {
  CONNECTING = 'connecting',
  AUTHENTICATED = 'authenticated',
  DRAINING = 'draining',
  CLOSED = 'closed',
}

export enum SupervisorState {
  IDLE = 'idle',
  CONNECTING = 'connecting',
  LIVE = 'live',
  BACKOFF = 'backoff',
  FATAL = 'fatal',
  STOPPED = 'stopped',
}

/**
 * Wire-level link to the core. One instance per session; never reopened.
 */
export interface CoreLink {
  /** Authenticate and open the inbound event stream. Rejects with `AuthError` or `TransportError`. */
  open(token: string, registrations: readonly CommandRegistration[]): Promise<void>;
  /** Register the inbound command listener. Must be called before `open`. */
  onCommand(cb: (command: InboundCommand) => void): void;
  /** Register the end-of-stream listener; called once, with the cause when the stream failed. */
  onClose(cb: (error?: Error) => void): void;
  /** Write one chat message to a channel. Rejects with `TransportError`. */
  sendMessage(channelId: string, text: string): Promise<void>;
  /** Cheap round trip used for liveness checks. */
  ping(timeoutMs: number): Promise<void>;
  close(): void;
}

export type CoreLinkFactory = () => CoreLink;
