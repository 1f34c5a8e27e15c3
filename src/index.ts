import { CraftyBotService } from './bot/services/CraftyBotService';
import { ConfigStore } from './services/ConfigStore';
import { getConfigPath, loadBotConfig, resolveDiscordToken } from './utils/config';
import { toError } from './utils/errorHandler';
import { LogContext, logger } from './utils/logger';

const SHUTDOWN_TIMEOUT_MS = 30000;

async function main(): Promise<void> {
  const context: LogContext = {
    component: 'Application',
    operation: 'startup'
  };

  logger.info('Crafty status bot starting...', context);

  const configPath = getConfigPath();
  let config: ConfigStore;
  try {
    config = new ConfigStore(() => loadBotConfig(configPath));
  } catch (error) {
    logger.error('Failed to load configuration', {
      ...context,
      metadata: { configPath }
    }, toError(error));
    process.exit(1);
  }

  logger.info('Configuration loaded', {
    ...context,
    metadata: {
      configPath,
      servers: Object.keys(config.current.servers).length,
      updateInterval: config.current.updateInterval
    }
  });

  const token = resolveDiscordToken(config.current);
  if (!token) {
    logger.error('No Discord token found in DISCORD_TOKEN or discord_token', context);
    process.exit(1);
  }

  const botService = new CraftyBotService(config);

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM', botService));
  process.on('SIGINT', () => gracefulShutdown('SIGINT', botService));

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Promise Rejection', {
      component: 'Application',
      operation: 'unhandled_rejection',
      metadata: {
        reason: reason instanceof Error ? reason.message : String(reason)
      }
    }, toError(reason));
  });

  await botService.start(token);
}

async function gracefulShutdown(signal: string, botService: CraftyBotService): Promise<void> {
  const context: LogContext = {
    component: 'Application',
    operation: 'shutdown',
    metadata: { signal }
  };

  logger.info(`Received ${signal}, shutting down gracefully...`, context);

  const shutdownTimeout = setTimeout(() => {
    logger.error('Shutdown timeout exceeded, forcing exit', context);
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);

  try {
    await botService.stop();
    clearTimeout(shutdownTimeout);
    logger.info('Graceful shutdown completed successfully', context);
    process.exit(0);
  } catch (error) {
    clearTimeout(shutdownTimeout);
    logger.error('Error during shutdown', context, toError(error));
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error('Failed to start application', {
    component: 'Application',
    operation: 'startup_failed'
  }, toError(error));
  process.exit(1);
});
