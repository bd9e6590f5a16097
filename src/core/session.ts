import { v4 as uuidv4 } from 'uuid';
import logger from '../utils/logger';
import { splitArgs, renderResponse } from './codec';
import { AuthError, TransportError, describeError } from './errors';
import {
  CommandEnvelope,
  CommandRegistration,
  CoreLink,
  InboundCommand,
  ResponseEnvelope,
  SessionState,
} from './types';

const STATE_ORDER: SessionState[] = [
  SessionState.CONNECTING,
  SessionState.AUTHENTICATED,
  SessionState.DRAINING,
  SessionState.CLOSED,
];

type Waiter = (envelope: CommandEnvelope | undefined) => void;

/**
 * One logical, authenticated connection to the core.
 *
 * Wraps a single {@link CoreLink}: performs the handshake, buffers inbound command
 * events as envelopes, and writes rendered responses. A session is never reconnected;
 * the supervisor replaces it with a fresh instance instead.
 */
export class TransportSession {
  readonly id = uuidv4();

  private currentState = SessionState.CONNECTING;
  private lastActivityAt: number;
  private ended = false;
  private endError?: Error;
  private linkClosed = false;
  private readonly endListeners = new Set<() => void>();

  private readonly inbound: CommandEnvelope[] = [];
  private readonly waiters: Waiter[] = [];
  private readonly pending = new Set<string>();

  constructor(
    private readonly link: CoreLink,
    private readonly token: string,
    private readonly registrations: readonly CommandRegistration[],
    private readonly now: () => number = Date.now,
  ) {
    this.lastActivityAt = now();
    link.onCommand((command) => this.accept(command));
    link.onClose((error) => this.finish(error));
  }

  get state(): SessionState {
    return this.currentState;
  }

  /** Timestamp of the last successful send, receive or heartbeat. */
  get lastActivity(): number {
    return this.lastActivityAt;
  }

  /** Cause of the stream ending, when it ended with an error. */
  get closeError(): Error | undefined {
    return this.endError;
  }

  get isAuthenticated(): boolean {
    return this.currentState === SessionState.AUTHENTICATED;
  }

  /**
   * Perform the handshake and open the inbound stream.
   * @throws AuthError when the core rejects the token.
   * @throws TransportError for any network or handshake failure.
   */
  async connect(): Promise<void> {
    if (this.currentState !== SessionState.CONNECTING) {
      throw new TransportError(`Session ${this.id} cannot connect from state ${this.currentState}`);
    }

    try {
      await this.link.open(this.token, this.registrations);
    } catch (error) {
      this.transition(SessionState.CLOSED);
      this.closeLink();
      if (error instanceof AuthError || error instanceof TransportError) throw error;
      throw new TransportError(`Handshake failed: ${describeError(error)}`, error);
    }

    if (this.ended) {
      this.transition(SessionState.CLOSED);
      throw new TransportError('Stream closed during handshake', this.endError);
    }

    this.transition(SessionState.AUTHENTICATED);
    this.touch();
    logger.info(`[Session:${this.shortId}] Authenticated`);
  }

  /**
   * Next inbound envelope, or `undefined` once the stream has ended and every
   * envelope already read off the wire has been handed out.
   */
  receive(): Promise<CommandEnvelope | undefined> {
    const next = this.inbound.shift();
    if (next) {
      this.touch();
      return Promise.resolve(next);
    }
    if (this.ended) {
      this.transition(SessionState.CLOSED);
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  /** The inbound envelopes as an async sequence; ends with the stream. */
  async *messages(): AsyncGenerator<CommandEnvelope> {
    while (true) {
      const envelope = await this.receive();
      if (!envelope) return;
      yield envelope;
    }
  }

  /**
   * Write a response. Lines go out in order through the link.
   * @throws TransportError when the session is not authenticated or the write fails.
   */
  async send(response: ResponseEnvelope): Promise<void> {
    if (!this.isAuthenticated) {
      throw new TransportError(`Session ${this.id} is ${this.currentState}, cannot send`);
    }

    for (const line of renderResponse(response)) {
      try {
        await this.link.sendMessage(response.context.channelId, line);
      } catch (error) {
        if (error instanceof TransportError) throw error;
        throw new TransportError(`Send failed: ${describeError(error)}`, error);
      }
      this.touch();
    }
  }

  /** Liveness probe through the link. */
  async heartbeat(timeoutMs: number): Promise<void> {
    if (!this.isAuthenticated) {
      throw new TransportError(`Session ${this.id} is ${this.currentState}, cannot heartbeat`);
    }
    await this.link.ping(timeoutMs);
    this.touch();
  }

  /** True while a received correlation id still awaits its response. */
  isPending(correlationId: string): boolean {
    return this.pending.has(correlationId);
  }

  /** Marks a correlation id as answered. Returns false when it was unknown or already answered. */
  settle(correlationId: string): boolean {
    return this.pending.delete(correlationId);
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Called once when the inbound stream ends, whichever side ended it.
   * Fires immediately when the stream has already ended.
   */
  onEnd(cb: () => void): () => void {
    if (this.ended) {
      cb();
      return () => undefined;
    }
    this.endListeners.add(cb);
    return () => this.endListeners.delete(cb);
  }

  /**
   * Stop accepting writes and release the underlying link. Buffered envelopes can still be received.
   * The link is released even when the remote side already ended the stream.
   */
  close(reason = 'closed by client'): void {
    if (this.currentState !== SessionState.CLOSED) {
      this.transition(SessionState.DRAINING);
      logger.info(`[Session:${this.shortId}] Closing: ${reason}`);
    }
    this.closeLink();
    this.finish();
  }

  private closeLink(): void {
    if (this.linkClosed) return;
    this.linkClosed = true;
    try {
      this.link.close();
    } catch (error) {
      logger.debug(`[Session:${this.shortId}] Link close failed: ${describeError(error)}`);
    }
  }

  private get shortId(): string {
    return this.id.slice(0, 8);
  }

  private accept(command: InboundCommand): void {
    if (this.ended) {
      logger.warn(`[Session:${this.shortId}] Ignoring "${command.command}" received after stream end`);
      return;
    }

    const envelope: CommandEnvelope = Object.freeze({
      correlationId: uuidv4(),
      command: command.command,
      args: Object.freeze(splitArgs(command.arg)),
      rawArgs: command.arg,
      context: Object.freeze({ ...command.context }),
      receivedAt: this.now(),
    });
    this.pending.add(envelope.correlationId);
    this.touch();
    logger.debug(`[Session:${this.shortId}] Received "${envelope.command}" (${envelope.correlationId})`);

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(envelope);
    } else {
      this.inbound.push(envelope);
    }
  }

  private finish(error?: Error): void {
    if (this.ended) return;
    this.ended = true;
    this.endError = error;

    if (this.currentState === SessionState.AUTHENTICATED) {
      this.transition(SessionState.DRAINING);
    }
    if (error) {
      logger.warn(`[Session:${this.shortId}] Stream ended: ${error.message}`);
    } else {
      logger.info(`[Session:${this.shortId}] Stream ended`);
    }

    if (this.inbound.length === 0 && this.currentState !== SessionState.CONNECTING) {
      this.transition(SessionState.CLOSED);
    }
    // Waiters only exist while the buffer is empty.
    this.waiters.splice(0).forEach((waiter) => waiter(undefined));

    const listeners = [...this.endListeners];
    this.endListeners.clear();
    listeners.forEach((listener) => {
      try {
        listener();
      } catch (err) {
        logger.error(`[Session:${this.shortId}] End listener error: ${describeError(err)}`);
      }
    });
  }

  private transition(next: SessionState): void {
    if (STATE_ORDER.indexOf(next) <= STATE_ORDER.indexOf(this.currentState)) return;
    logger.debug(`[Session:${this.shortId}] ${this.currentState} -> ${next}`);
    this.currentState = next;
  }

  private touch(): void {
    this.lastActivityAt = this.now();
  }
}

export default TransportSession;
