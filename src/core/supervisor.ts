import logger from '../utils/logger';
import { computeBackoffDelay } from './backoff';
import { AuthError, describeError } from './errors';
import { TransportSession } from './session';
import {
  CommandEnvelope,
  CommandRegistration,
  CoreLinkFactory,
  SupervisorState,
} from './types';
import type { SupervisorConfig } from '../config/config';

/** Consumer of inbound envelopes; awaited before the next one is read (backpressure). */
export type EnvelopeSink = (envelope: CommandEnvelope) => Promise<void>;

export type StateListener = (state: SupervisorState, previous: SupervisorState) => void;
export type FatalListener = (error: AuthError) => void;

/** Read access to the live session, used by the response emitter. */
export interface SessionHost {
  currentSession(): TransportSession | undefined;
}

export interface SupervisorOptions extends SupervisorConfig {
  token: string;
  registrations: readonly CommandRegistration[];
  random?: () => number;
  now?: () => number;
}

/**
 * ReconnectionSupervisor
 * ----------------------
 * Keeps exactly one live session to the core for as long as the process runs.
 *
 * - Idle → Connecting on `start()`; Connecting → Live on a successful handshake.
 * - Recoverable failures back off exponentially (with jitter) and try again.
 * - An invalid credential is terminal (Fatal); retrying cannot fix it.
 * - A live session that ends, or stays silent past the liveness timeout, is
 *   replaced by a new one. Commands still running for the old session finish,
 *   but their responses are dropped by the emitter.
 */
export class ReconnectionSupervisor implements SessionHost {
  private state = SupervisorState.IDLE;
  private attempt = 0;
  // Exponent of the next backoff delay. Unlike `attempt` it also grows after a
  // dropped live session, so a failed reconnect waits longer than the drop did.
  private backoffStep = 0;
  private lastDelay?: number;
  private session?: TransportSession;

  private backoffTimer?: NodeJS.Timeout;
  private heartbeatTimer?: NodeJS.Timeout;
  private probing = false;

  private readonly stateListeners = new Set<StateListener>();
  private readonly fatalListeners = new Set<FatalListener>();
  private readonly now: () => number;

  constructor(
    private readonly linkFactory: CoreLinkFactory,
    private readonly sink: EnvelopeSink,
    private readonly options: SupervisorOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  get currentState(): SupervisorState {
    return this.state;
  }

  /** Failed connect attempts since the last time a session went live. */
  get attempts(): number {
    return this.attempt;
  }

  /** Delay chosen for the most recent backoff, if there was one. */
  get lastBackoffDelay(): number | undefined {
    return this.lastDelay;
  }

  /** The live, authenticated session, if any. Never held across a reconnect. */
  currentSession(): TransportSession | undefined {
    if (this.state !== SupervisorState.LIVE) return undefined;
    return this.session?.isAuthenticated ? this.session : undefined;
  }

  /** Subscribe to state transitions. Returns an unsubscribe function. */
  onStateChange(cb: StateListener): () => void {
    this.stateListeners.add(cb);
    return () => this.stateListeners.delete(cb);
  }

  /** Subscribe to the terminal credential failure. Returns an unsubscribe function. */
  onFatal(cb: FatalListener): () => void {
    this.fatalListeners.add(cb);
    return () => this.fatalListeners.delete(cb);
  }

  start(): void {
    if (this.state !== SupervisorState.IDLE) {
      logger.warn(`[Supervisor] start() ignored in state ${this.state}`);
      return;
    }
    this.connect();
  }

  /** Stop reconnecting and close the current session. */
  stop(): void {
    if (this.state === SupervisorState.STOPPED) return;
    this.clearTimers();
    const session = this.session;
    this.session = undefined;
    this.setState(SupervisorState.STOPPED);
    session?.close('supervisor stopped');
  }

  private connect(): void {
    this.setState(SupervisorState.CONNECTING);
    const session = new TransportSession(
      this.linkFactory(),
      this.options.token,
      this.options.registrations,
      this.now,
    );
    this.session = session;
    void this.runSession(session);
  }

  /**
   * Handshake, then pump envelopes until the session ends. Never rejects.
   * The end of the stream is handled as soon as it happens, not once the sink
   * has worked through the backlog; envelopes still buffered for a replaced
   * session are not handed to the sink.
   */
  private async runSession(session: TransportSession): Promise<void> {
    try {
      await session.connect();
    } catch (error) {
      this.handleConnectFailure(session, error);
      return;
    }

    if (this.session !== session || this.state !== SupervisorState.CONNECTING) {
      session.close('supervisor no longer connecting');
      return;
    }

    this.attempt = 0;
    this.backoffStep = 0;
    this.setState(SupervisorState.LIVE);
    this.startLiveness(session);
    session.onEnd(() => this.handleDisconnect(session));

    try {
      for await (const envelope of session.messages()) {
        if (this.session !== session) {
          logger.debug(`[Supervisor] Skipping "${envelope.command}" from a replaced session`);
          break;
        }
        await this.sink(envelope);
      }
    } catch (error) {
      logger.error(`[Supervisor] Envelope sink failed: ${describeError(error)}`);
    }

    this.handleDisconnect(session);
  }

  private handleConnectFailure(session: TransportSession, error: unknown): void {
    if (this.session !== session || this.state !== SupervisorState.CONNECTING) return;
    this.session = undefined;

    if (error instanceof AuthError && error.fatal) {
      logger.error(`[Supervisor] Core rejected credentials: ${error.message}. Not retrying.`);
      this.setState(SupervisorState.FATAL);
      this.fatalListeners.forEach((listener) => {
        try {
          listener(error);
        } catch (err) {
          logger.error(`[Supervisor] Fatal listener error: ${describeError(err)}`);
        }
      });
      return;
    }

    const delay = this.nextBackoffDelay();
    this.attempt += 1;
    logger.warn(
      `[Supervisor] Connect attempt ${this.attempt} failed: ${describeError(error)}. Retrying in ${delay}ms`,
    );
    this.enterBackoff(delay);
  }

  private handleDisconnect(session: TransportSession): void {
    if (this.session !== session || this.state !== SupervisorState.LIVE) return;
    this.stopLiveness();
    this.session = undefined;
    session.close('disconnected');

    const reason = session.closeError ? describeError(session.closeError) : 'stream ended';
    if (session.pendingCount > 0) {
      logger.warn(
        `[Supervisor] Session lost (${reason}); ${session.pendingCount} in-flight command(s) will not be answered`,
      );
    } else {
      logger.warn(`[Supervisor] Session lost (${reason})`);
    }

    const delay = this.nextBackoffDelay();
    logger.info(`[Supervisor] Reconnecting in ${delay}ms`);
    this.enterBackoff(delay);
  }

  private nextBackoffDelay(): number {
    const delay = computeBackoffDelay(this.backoffStep, this.backoffOptions(), this.options.random);
    this.backoffStep += 1;
    return delay;
  }

  private enterBackoff(delay: number): void {
    this.lastDelay = delay;
    this.setState(SupervisorState.BACKOFF);
    this.backoffTimer = setTimeout(() => {
      this.backoffTimer = undefined;
      if (this.state === SupervisorState.BACKOFF) this.connect();
    }, delay);
  }

  private startLiveness(session: TransportSession): void {
    this.stopLiveness();
    this.heartbeatTimer = setInterval(() => {
      void this.checkLiveness(session);
    }, this.options.heartbeatIntervalMs);
  }

  private stopLiveness(): void {
    if (this.heartbeatTimer) clearInterval(this.heartbeatTimer);
    this.heartbeatTimer = undefined;
    this.probing = false;
  }

  /** Treat a session idle past the liveness timeout as disconnected; probe it when merely quiet. */
  private async checkLiveness(session: TransportSession): Promise<void> {
    if (this.session !== session || this.state !== SupervisorState.LIVE) return;

    const idle = this.now() - session.lastActivity;
    if (idle > this.options.livenessTimeoutMs) {
      logger.warn(`[Supervisor] No activity for ${idle}ms, dropping session`);
      session.close('liveness timeout');
      return;
    }

    if (idle < this.options.heartbeatIntervalMs || this.probing) return;

    this.probing = true;
    try {
      await session.heartbeat(this.options.heartbeatIntervalMs);
    } catch (error) {
      logger.debug(`[Supervisor] Heartbeat failed: ${describeError(error)}`);
    } finally {
      this.probing = false;
    }
  }

  private backoffOptions() {
    return { baseMs: this.options.backoffBaseMs, capMs: this.options.backoffCapMs };
  }

  private clearTimers(): void {
    if (this.backoffTimer) clearTimeout(this.backoffTimer);
    this.backoffTimer = undefined;
    this.stopLiveness();
  }

  private setState(next: SupervisorState): void {
    if (next === this.state) return;
    const previous = this.state;
    this.state = next;
    logger.debug(`[Supervisor] ${previous} -> ${next}`);
    this.stateListeners.forEach((listener) => {
      try {
        listener(next, previous);
      } catch (error) {
        logger.error(`[Supervisor] State listener error: ${describeError(error)}`);
      }
    });
  }
}

export default ReconnectionSupervisor;
