import type { CommandHandler } from './commandTypes';

/**
 * Returns the bad-arguments message for an argument count outside the handler's range,
 * or undefined when the count is acceptable.
 */
export function checkArity(handler: CommandHandler, count: number): string | undefined {
  if (count >= handler.minArgs && count <= handler.maxArgs) return undefined;
  return `invalid ${handler.name} command. Usage: ${handler.usage}`;
}

/**
 * Optional positional argument, or undefined when it was not supplied.
 */
export function optionalArg(args: readonly string[], index: number): string | undefined {
  return index < args.length ? args[index] : undefined;
}

/**
 * Upper-cases and matches a value against a closed list of names.
 */
export function matchName<T extends string>(value: string, names: readonly T[]): T | undefined {
  const upper = value.trim().toUpperCase();
  return names.find((name) => name.toUpperCase() === upper);
}
