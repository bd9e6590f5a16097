import logger, { setLogLevel } from './utils/logger';
import { AppConfig, loadConfig, validateConfig } from './config/config';
import { redactToken } from './config/auth';
import { AuthError, ConfigurationError, describeError } from './core/errors';
import { RadioPlugin } from './plugin';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
/** EX_CONFIG: the credential was rejected and retrying cannot help. */
export const EXIT_FATAL_AUTH = 78;

export type ExitFn = (code: number) => void;

export interface ApplicationOptions {
  env?: Record<string, string | undefined>;
  exit: ExitFn;
  createPlugin?: (config: AppConfig) => RadioPlugin;
}

/** Process exit status for an error that ends the application. */
export function exitCodeFor(error: unknown): number {
  if (error instanceof AuthError && error.fatal) return EXIT_FATAL_AUTH;
  return EXIT_FAILURE;
}

/**
 * Load and validate configuration, then start the plugin.
 * Startup errors and a permanent credential rejection end in `exit`.
 * Returns the running plugin, or undefined when startup failed.
 */
export function startApplication(options: ApplicationOptions): RadioPlugin | undefined {
  const { exit } = options;
  const createPlugin = options.createPlugin ?? ((config: AppConfig) => new RadioPlugin(config));

  try {
    const config = loadConfig(options.env);
    setLogLevel(config.logLevel);
    validateConfig(config);

    logger.info('[Main] Starting seabird-radio');
    logger.info(`[Main] Core: ${config.core.url} (token ${redactToken(config.core.token)})`);

    const plugin = createPlugin(config);
    plugin.onFatal((error) => {
      logger.error(`[Main] Authentication failed permanently: ${error.message}`);
      plugin.stop();
      exit(exitCodeFor(error));
    });
    plugin.start();
    return plugin;
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      logger.error(`[Main] ${error.message}`);
    } else {
      logger.error(`[Main] Error during initialization or setup: ${describeError(error)}`);
    }
    exit(exitCodeFor(error));
    return undefined;
  }
}

/**
 * Stop the plugin and exit cleanly. A stop failure is logged; the exit still happens.
 */
export function shutdownApplication(plugin: RadioPlugin | undefined, signal: NodeJS.Signals, exit: ExitFn): void {
  logger.info(`[Main] Received shutdown signal: ${signal}. Shutting down gracefully.`);
  try {
    plugin?.stop();
  } catch (error) {
    logger.error(`[Main] Error during shutdown: ${describeError(error)}`);
  }
  exit(EXIT_OK);
}
