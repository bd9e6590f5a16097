import logger from '../utils/logger';
import { describeError } from './errors';
import type { SessionHost } from './supervisor';
import { ResponseEnvelope } from './types';

export interface EmitterStats {
  emitted: number;
  dropped: number;
}

/**
 * Single writer for responses.
 *
 * Writes are chained so the lines of one response are never interleaved with another's.
 * Delivery is at most once and bound to the session that received the request: when that
 * session is no longer the live one (or the id was already answered) the response is dropped.
 */
export class ResponseEmitter {
  private chain: Promise<void> = Promise.resolve();
  private emitted = 0;
  private dropped = 0;

  constructor(private readonly host: SessionHost) {}

  /** Queue a response for writing. Resolves once it was written or dropped; never rejects. */
  emit(response: ResponseEnvelope): Promise<void> {
    const write = this.chain.then(() => this.write(response));
    this.chain = write;
    return write;
  }

  stats(): EmitterStats {
    return { emitted: this.emitted, dropped: this.dropped };
  }

  private async write(response: ResponseEnvelope): Promise<void> {
    const session = this.host.currentSession();
    if (!session) {
      this.drop(response, 'no live session');
      return;
    }

    if (!session.settle(response.correlationId)) {
      this.drop(response, 'correlation id is not pending on the live session');
      return;
    }

    try {
      await session.send(response);
      this.emitted += 1;
    } catch (error) {
      this.drop(response, describeError(error));
    }
  }

  private drop(response: ResponseEnvelope, reason: string): void {
    this.dropped += 1;
    logger.warn(`[Emitter] Dropped response ${response.correlationId}: ${reason}`);
  }
}

export default ResponseEmitter;
