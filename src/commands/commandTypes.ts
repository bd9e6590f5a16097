import { ConfigurationError } from '../core/errors';
import {
  CommandEnvelope,
  CommandRegistration,
  ErrorCode,
  ResponseEnvelope,
} from '../core/types';

/**
 * A command the plugin contributes to the core. Registered once at startup.
 */
export interface CommandHandler {
  readonly name: string;
  readonly shortHelp: string;
  readonly fullHelp: string;
  /** Shown with bad-arguments errors, e.g. `pota <band> [mode]`. */
  readonly usage: string;
  readonly minArgs: number;
  readonly maxArgs: number;
  /** Resolve the command to chat lines. Throw a domain error to answer with a structured error. */
  invoke(envelope: CommandEnvelope): Promise<string[]>;
}

/** Read-only lookup table of handlers, keyed by command name. */
export type CommandRegistry = ReadonlyMap<string, CommandHandler>;

/**
 * Builds the handler table once. Duplicate names are a configuration error.
 */
export function buildRegistry(handlers: readonly CommandHandler[]): CommandRegistry {
  const registry = new Map<string, CommandHandler>();
  for (const handler of handlers) {
    const name = handler.name.trim();
    if (!name) {
      throw new ConfigurationError('Command handlers need a non-empty name');
    }
    if (registry.has(name)) {
      throw new ConfigurationError(`Command "${name}" is registered more than once`);
    }
    if (handler.minArgs < 0 || handler.maxArgs < handler.minArgs) {
      throw new ConfigurationError(`Command "${name}" has an invalid argument range`);
    }
    registry.set(name, Object.freeze(handler));
  }
  return registry;
}

/** Metadata advertised to the core, in registration order. */
export function toRegistrations(registry: CommandRegistry): CommandRegistration[] {
  return Array.from(registry.values()).map((handler) => ({
    name: handler.name,
    shortHelp: handler.shortHelp,
    fullHelp: handler.fullHelp,
  }));
}

export function okResponse(
  envelope: CommandEnvelope,
  lines: string[],
  now: () => number = Date.now,
): ResponseEnvelope {
  return {
    correlationId: envelope.correlationId,
    context: envelope.context,
    payload: { kind: 'ok', lines },
    emittedAt: now(),
  };
}

export function errorResponse(
  envelope: CommandEnvelope,
  code: ErrorCode,
  message: string,
  now: () => number = Date.now,
): ResponseEnvelope {
  return {
    correlationId: envelope.correlationId,
    context: envelope.context,
    payload: { kind: 'error', error: { code, message } },
    emittedAt: now(),
  };
}
