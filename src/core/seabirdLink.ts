import fs from 'fs';
import path from 'path';
import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import logger from '../utils/logger';
import { computeAuthorizationHeader } from '../config/auth';
import { decodeEvent, encodeRegistrations, encodeSendMessage } from './codec';
import { AuthError, ConfigurationError, TransportError } from './errors';
import { CommandRegistration, CoreLink, InboundCommand } from './types';

/**
 * gRPC link to a Seabird core.
 *
 * Handshake: `GetCoreInfo` with the bearer token in the `authorization` metadata.
 * Inbound:   server-streaming `StreamEvents`, which also registers our commands.
 * Outbound:  one `SendMessage` call per chat line.
 */

// Sources live in src/core, compiled output in dist/src/core.
const PROTO_CANDIDATES = [
  path.resolve(__dirname, '..', '..', 'proto', 'seabird.proto'),
  path.resolve(__dirname, '..', '..', '..', 'proto', 'seabird.proto'),
];
const PROTO_PATH =
  process.env.SEABIRD_PROTO_PATH || PROTO_CANDIDATES.find((candidate) => fs.existsSync(candidate)) || PROTO_CANDIDATES[0];
const SERVICE_NAME = 'seabird.Seabird';
const DEFAULT_CALL_TIMEOUT_MS = 10_000;

type Method = protoLoader.MethodDefinition<object, object>;

interface SeabirdMethods {
  streamEvents: Method;
  sendMessage: Method;
  getCoreInfo: Method;
}

let cachedMethods: SeabirdMethods | undefined;

function isServiceDefinition(definition: protoLoader.AnyDefinition): definition is protoLoader.ServiceDefinition {
  return !('format' in definition);
}

function isServiceError(error: unknown): error is grpc.ServiceError {
  return error instanceof Error && 'code' in error && typeof error.code === 'number';
}

/** Loads the Seabird schema once per process. */
export function loadSeabirdMethods(protoPath = PROTO_PATH): SeabirdMethods {
  if (cachedMethods) return cachedMethods;

  const definition = protoLoader.loadSync(protoPath, {
    keepCase: true,
    longs: String,
    enums: String,
    defaults: true,
    oneofs: true,
  });

  const service = definition[SERVICE_NAME];
  if (!service || !isServiceDefinition(service)) {
    throw new ConfigurationError(`Service ${SERVICE_NAME} not found in ${protoPath}`);
  }

  const pick = (name: string): Method => {
    const method = service[name];
    if (!method) throw new ConfigurationError(`Method ${SERVICE_NAME}/${name} not found in ${protoPath}`);
    return method;
  };

  cachedMethods = {
    streamEvents: pick('StreamEvents'),
    sendMessage: pick('SendMessage'),
    getCoreInfo: pick('GetCoreInfo'),
  };
  return cachedMethods;
}

/**
 * Translates a core URL into a gRPC target and channel credentials.
 * `https://host` → TLS on 443, `http://host:port` → plaintext.
 */
export function resolveTarget(url: string): { target: string; secure: boolean } {
  const parsed = new URL(url);
  const secure = parsed.protocol === 'https:';
  const port = parsed.port || (secure ? '443' : '80');
  return { target: `${parsed.hostname}:${port}`, secure };
}

/**
 * Maps a failed handshake onto the error taxonomy. Credential rejections are not retryable;
 * RESOURCE_EXHAUSTED while authenticating is the core throttling us.
 */
export function classifyHandshakeError(error: unknown): AuthError | TransportError {
  if (isServiceError(error)) {
    switch (error.code) {
      case grpc.status.UNAUTHENTICATED:
      case grpc.status.PERMISSION_DENIED:
        return new AuthError(error.details || error.message, 'invalid-credential');
      case grpc.status.RESOURCE_EXHAUSTED:
        return new AuthError(error.details || error.message, 'transient');
      default:
        return new TransportError(`Handshake failed (${grpc.status[error.code]}): ${error.details || error.message}`, error);
    }
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(`Handshake failed: ${message}`, error);
}

export class SeabirdLink implements CoreLink {
  private client?: grpc.Client;
  private call?: grpc.ClientReadableStream<object>;
  private metadata = new grpc.Metadata();

  private commandListener?: (command: InboundCommand) => void;
  private closeListener?: (error?: Error) => void;
  private closing = false;
  private finished = false;

  constructor(
    private readonly url: string,
    private readonly callTimeoutMs = DEFAULT_CALL_TIMEOUT_MS,
  ) {}

  onCommand(cb: (command: InboundCommand) => void): void {
    this.commandListener = cb;
  }

  onClose(cb: (error?: Error) => void): void {
    this.closeListener = cb;
  }

  async open(token: string, registrations: readonly CommandRegistration[]): Promise<void> {
    const methods = loadSeabirdMethods();
    const { target, secure } = resolveTarget(this.url);
    const credentials = secure ? grpc.credentials.createSsl() : grpc.credentials.createInsecure();

    this.client = new grpc.Client(target, credentials, {
      'grpc.keepalive_time_ms': 30_000,
      'grpc.keepalive_timeout_ms': 10_000,
    });
    this.metadata = new grpc.Metadata();
    this.metadata.set('authorization', computeAuthorizationHeader(token));

    logger.info(`[SeabirdLink] Connecting to ${target} (${secure ? 'tls' : 'plaintext'})`);
    try {
      await this.unary(methods.getCoreInfo, {}, this.callTimeoutMs);
    } catch (error) {
      throw classifyHandshakeError(error);
    }

    const call = this.client.makeServerStreamRequest(
      methods.streamEvents.path,
      methods.streamEvents.requestSerialize,
      methods.streamEvents.responseDeserialize,
      encodeRegistrations(registrations),
      this.metadata,
    );
    this.call = call;

    call.on('data', (event: unknown) => {
      const command = decodeEvent(event);
      if (command) this.commandListener?.(command);
    });
    call.on('error', (error: Error) => {
      if (this.closing && isServiceError(error) && error.code === grpc.status.CANCELLED) {
        this.finish();
        return;
      }
      if (isServiceError(error) && error.code === grpc.status.UNAUTHENTICATED) {
        this.finish(new AuthError(error.details || error.message, 'invalid-credential'));
        return;
      }
      this.finish(new TransportError(`Event stream failed: ${error.message}`, error));
    });
    call.on('end', () => this.finish());
  }

  async sendMessage(channelId: string, text: string): Promise<void> {
    const methods = loadSeabirdMethods();
    try {
      await this.unary(methods.sendMessage, encodeSendMessage(channelId, text), this.callTimeoutMs);
    } catch (error) {
      if (error instanceof TransportError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportError(`SendMessage failed: ${message}`, error);
    }
  }

  async ping(timeoutMs: number): Promise<void> {
    const methods = loadSeabirdMethods();
    try {
      await this.unary(methods.getCoreInfo, {}, timeoutMs);
    } catch (error) {
      if (error instanceof TransportError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Ping failed: ${message}`, error);
    }
  }

  close(): void {
    this.closing = true;
    try {
      this.call?.cancel();
      this.client?.close();
    } finally {
      this.call = undefined;
      this.client = undefined;
      this.finish();
    }
  }

  private unary(method: Method, request: object, timeoutMs: number): Promise<object> {
    const client = this.client;
    if (!client) return Promise.reject(new TransportError('Not connected'));

    return new Promise((resolve, reject) => {
      client.makeUnaryRequest(
        method.path,
        method.requestSerialize,
        method.responseDeserialize,
        request,
        this.metadata,
        { deadline: Date.now() + timeoutMs },
        (error, value) => {
          if (error) {
            reject(error);
            return;
          }
          resolve(value ?? {});
        },
      );
    });
  }

  private finish(error?: Error): void {
    if (this.finished) return;
    this.finished = true;
    this.closeListener?.(error);
  }
}

export default SeabirdLink;
