import {
  CommandRegistration,
  InboundCommand,
  ReplyContext,
  ResponseEnvelope,
  StructuredError,
} from './types';

/**
 * Mapping between the plugin's envelopes and the Seabird message shapes
 * (as produced by proto-loader with `keepCase` and `oneofs` enabled).
 */

export interface WireCommandMetadata {
  name: string;
  short_help: string;
  full_help: string;
}

export interface WireStreamEventsRequest {
  commands: Record<string, WireCommandMetadata>;
}

export interface WireSendMessageRequest {
  channel_id: string;
  text: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(source: Record<string, unknown>, key: string): string {
  const value = source[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Split the raw argument text of a command into whitespace-separated words.
 */
export function splitArgs(raw: string | undefined): string[] {
  return (raw ?? '').split(/\s+/).filter((part) => part.length > 0);
}

/**
 * Extracts a command invocation from a decoded `Event`. Other event kinds (and
 * command events without a channel) yield `undefined`.
 */
export function decodeEvent(raw: unknown): InboundCommand | undefined {
  if (!isRecord(raw)) return undefined;
  if (raw.inner !== undefined && raw.inner !== 'command') return undefined;

  const command = raw.command;
  if (!isRecord(command)) return undefined;

  const name = stringField(command, 'command');
  const source = command.source;
  if (!name || !isRecord(source)) return undefined;

  const channelId = stringField(source, 'channel_id');
  if (!channelId) return undefined;

  const context: ReplyContext = { channelId };
  const user = source.user;
  if (isRecord(user)) {
    const userId = stringField(user, 'id');
    const displayName = stringField(user, 'display_name');
    if (userId) context.userId = userId;
    if (displayName) context.displayName = displayName;
  }

  return { command: name, arg: stringField(command, 'arg'), context };
}

export function encodeRegistrations(registrations: readonly CommandRegistration[]): WireStreamEventsRequest {
  const commands: Record<string, WireCommandMetadata> = {};
  for (const registration of registrations) {
    commands[registration.name] = {
      name: registration.name,
      short_help: registration.shortHelp,
      full_help: registration.fullHelp,
    };
  }
  return { commands };
}

/**
 * User-facing text for a structured error.
 */
export function errorText(error: StructuredError): string {
  switch (error.code) {
    case 'unknown-command':
    case 'bad-arguments':
      return error.message;
    case 'rate-limited':
      return 'too many requests right now, try again later';
    case 'upstream-unavailable':
      return 'radio data service unavailable, try again later';
    case 'timeout':
      return 'command timed out';
    case 'internal':
      return 'something went wrong';
  }
}

/**
 * Prefix a message with the requesting user's name, when known.
 */
export function withReply(context: ReplyContext, message: string): string {
  return context.displayName ? `${context.displayName}: ${message}` : message;
}

/**
 * Text lines for a response; only the first line carries the reply prefix.
 */
export function renderResponse(response: ResponseEnvelope): string[] {
  const lines =
    response.payload.kind === 'ok' ? response.payload.lines : [errorText(response.payload.error)];
  if (lines.length === 0) return [];
  const [first, ...rest] = lines;
  return [withReply(response.context, first), ...rest];
}

export function encodeSendMessage(channelId: string, text: string): WireSendMessageRequest {
  return { channel_id: channelId, text };
}
