import logger from '../utils/logger';
import {
  BadArgumentsError,
  CommandTimeoutError,
  RateLimitedError,
  UnknownCommandError,
  UpstreamUnavailableError,
  describeError,
} from '../core/errors';
import { CommandEnvelope, ResponseEnvelope, StructuredError } from '../core/types';
import type { RouterConfig } from '../config/config';
import { CommandHandler, CommandRegistry, errorResponse, okResponse } from './commandTypes';
import { checkArity } from './commandUtils';
import { InFlightGate } from './inFlightGate';

export type ResponseSink = (response: ResponseEnvelope) => Promise<void>;

/**
 * Maps a handler failure onto the structured error sent back to the core.
 */
export function toStructuredError(error: unknown): StructuredError {
  if (error instanceof BadArgumentsError) return { code: 'bad-arguments', message: error.message };
  if (error instanceof UnknownCommandError) return { code: 'unknown-command', message: error.message };
  if (error instanceof RateLimitedError) return { code: 'rate-limited', message: error.message };
  if (error instanceof UpstreamUnavailableError) return { code: 'upstream-unavailable', message: error.message };
  if (error instanceof CommandTimeoutError) return { code: 'timeout', message: error.message };
  return { code: 'internal', message: describeError(error) };
}

/**
 * Central dispatcher turning command envelopes into responses.
 *
 * Every envelope gets exactly one response: unknown names and argument-count violations are
 * answered without touching a handler, and handler failures are converted into structured
 * errors. Invocations run concurrently up to `maxInFlight`.
 */
export class CommandRouter {
  private readonly gate: InFlightGate;

  constructor(
    private readonly registry: CommandRegistry,
    private readonly options: RouterConfig,
    private readonly now: () => number = Date.now,
  ) {
    this.gate = new InFlightGate(options.maxInFlight);
  }

  get inFlight(): number {
    return this.gate.activeCount;
  }

  /** Envelopes waiting for an in-flight slot. */
  get waiting(): number {
    return this.gate.waitingCount;
  }

  /** Route one envelope and resolve with its response. Never rejects. */
  async dispatch(envelope: CommandEnvelope): Promise<ResponseEnvelope> {
    const release = await this.gate.acquire();
    try {
      return await this.route(envelope);
    } finally {
      release();
    }
  }

  /**
   * Wait for an in-flight slot, then route in the background and hand the response to `deliver`.
   * Resolves as soon as the invocation has started, which throttles the caller's read loop.
   * `stillWanted` is checked once the slot is granted; when it returns false the envelope is
   * dropped without running its handler.
   */
  async submit(
    envelope: CommandEnvelope,
    deliver: ResponseSink,
    stillWanted: () => boolean = () => true,
  ): Promise<void> {
    if (this.gate.activeCount >= this.options.maxInFlight) {
      logger.debug(
        `[Router] All ${this.options.maxInFlight} slot(s) busy; "${envelope.command}" queued behind ${this.gate.waitingCount}`,
      );
    }
    const release = await this.gate.acquire();
    if (!stillWanted()) {
      release();
      logger.debug(`[Router] Dropping "${envelope.command}" (${envelope.correlationId}): no longer wanted`);
      return;
    }
    void this.route(envelope)
      .then(deliver)
      .catch((error) => {
        logger.error(`[Router] Delivering response ${envelope.correlationId} failed: ${describeError(error)}`);
      })
      .finally(release);
  }

  private async route(envelope: CommandEnvelope): Promise<ResponseEnvelope> {
    const handler = this.registry.get(envelope.command);
    if (!handler) {
      logger.info(`[Router] Unknown command "${envelope.command}" (${envelope.correlationId})`);
      const error = new UnknownCommandError(envelope.command);
      return errorResponse(envelope, 'unknown-command', error.message, this.now);
    }

    const arityProblem = checkArity(handler, envelope.args.length);
    if (arityProblem) {
      logger.debug(`[Router] Bad arguments for "${handler.name}": ${envelope.args.length} given`);
      return errorResponse(envelope, 'bad-arguments', arityProblem, this.now);
    }

    const started = this.now();
    try {
      const lines = await this.invokeWithTimeout(handler, envelope);
      logger.debug(`[Router] "${handler.name}" answered in ${this.now() - started}ms`);
      return okResponse(envelope, lines, this.now);
    } catch (error) {
      const structured = toStructuredError(error);
      if (structured.code === 'internal') {
        logger.error(`[Router] "${handler.name}" failed (${envelope.correlationId}): ${structured.message}`);
      } else {
        logger.info(`[Router] "${handler.name}" answered with ${structured.code}: ${structured.message}`);
      }
      return errorResponse(envelope, structured.code, structured.message, this.now);
    }
  }

  /** Soft timeout: the handler keeps running, but its result is no longer awaited. */
  private invokeWithTimeout(handler: CommandHandler, envelope: CommandEnvelope): Promise<string[]> {
    const timeoutMs = this.options.handlerTimeoutMs;
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => reject(new CommandTimeoutError(handler.name, timeoutMs)), timeoutMs);
      void Promise.resolve()
        .then(() => handler.invoke(envelope))
        .then(
          (lines) => {
            clearTimeout(timer);
            resolve(lines);
          },
          (error: unknown) => {
            clearTimeout(timer);
            reject(error);
          },
        );
    });
  }
}

export default CommandRouter;
