import logger from './utils/logger';
import type { AppConfig } from './config/config';
import { HttpRadioUpstream, RadioUpstream } from './backend/radio/radioUpstream';
import { RadioClient } from './backend/radio/radioClient';
import { createBandsCommand } from './commands/bandsCommand';
import { createPotaCommand } from './commands/potaCommand';
import { buildRegistry, toRegistrations } from './commands/commandTypes';
import { CommandRouter } from './commands/router';
import { ResponseEmitter } from './core/emitter';
import { SeabirdLink } from './core/seabirdLink';
import { FatalListener, ReconnectionSupervisor, StateListener } from './core/supervisor';
import { CoreLinkFactory } from './core/types';

export interface RadioPluginDeps {
  linkFactory?: CoreLinkFactory;
  upstream?: RadioUpstream;
  now?: () => number;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Wires the radio commands to a Seabird core:
 * supervisor (sessions) → router (handlers) → emitter (responses).
 */
export class RadioPlugin {
  readonly radio: RadioClient;
  readonly router: CommandRouter;
  readonly emitter: ResponseEmitter;
  readonly supervisor: ReconnectionSupervisor;

  constructor(config: AppConfig, deps: RadioPluginDeps = {}) {
    const now = deps.now ?? Date.now;
    const upstream = deps.upstream ?? new HttpRadioUpstream(config.radio);
    const linkFactory = deps.linkFactory ?? (() => new SeabirdLink(config.core.url));

    this.radio = new RadioClient(upstream, { ...config.radio, now, sleep: deps.sleep });
    const registry = buildRegistry([createBandsCommand(this.radio), createPotaCommand(this.radio, now)]);
    this.router = new CommandRouter(registry, config.router, now);
    this.emitter = new ResponseEmitter({ currentSession: () => this.supervisor.currentSession() });

    this.supervisor = new ReconnectionSupervisor(
      linkFactory,
      (envelope) =>
        this.router.submit(
          envelope,
          (response) => this.emitter.emit(response),
          () => this.supervisor.currentSession()?.isPending(envelope.correlationId) === true,
        ),
      {
        ...config.supervisor,
        token: config.core.token,
        registrations: toRegistrations(registry),
        random: deps.random,
        now,
      },
    );

    logger.debug(`[RadioPlugin] Registered commands: ${Array.from(registry.keys()).join(', ')}`);
  }

  start(): void {
    logger.info('[RadioPlugin] Starting');
    this.supervisor.start();
  }

  stop(): void {
    logger.info('[RadioPlugin] Stopping');
    this.supervisor.stop();
  }

  onStateChange(cb: StateListener): () => void {
    return this.supervisor.onStateChange(cb);
  }

  onFatal(cb: FatalListener): () => void {
    return this.supervisor.onFatal(cb);
  }
}

export default RadioPlugin;
