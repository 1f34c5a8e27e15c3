import { BotConfig } from '../models';
import { logger } from '../utils/logger';

/**
 * Process-wide configuration, replaced wholesale on reload
 */
export class ConfigStore {
  private config: BotConfig;
  private readonly loader: () => BotConfig;

  constructor(loader: () => BotConfig) {
    this.loader = loader;
    this.config = loader();
  }

  get current(): BotConfig {
    return this.config;
  }

  /**
   * Re-read the configuration source. On failure the previous configuration stays in place.
   */
  reload(): BotConfig {
    const next = this.loader();
    this.config = next;

    logger.info('Configuration reloaded', {
      component: 'ConfigStore',
      operation: 'reload',
      metadata: {
        servers: Object.keys(next.servers).length,
        updateInterval: next.updateInterval,
        categoryName: next.categoryName
      }
    });

    return next;
  }
}
