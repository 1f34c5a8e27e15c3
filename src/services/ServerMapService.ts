import { logger } from '../utils/logger';
import type { ConfigStore } from './ConfigStore';
import type { CraftyClient } from './CraftyClient';

/**
 * Friendly server names mapped to Crafty server ids.
 * Readers always see one complete generation of the map.
 */
export class ServerMapService {
  private entries: ReadonlyMap<string, string> = new Map();
  private lastRefresh: Date | null = null;

  constructor(
    private readonly crafty: CraftyClient,
    private readonly config: ConfigStore
  ) {}

  /**
   * Rebuild the map from the live server list. If the list cannot be fetched
   * the previous map is kept and the error propagates.
   */
  async refresh(): Promise<ReadonlyMap<string, string>> {
    const servers = await this.crafty.listServers();
    const idByName = new Map(servers.map(server => [server.name, server.id]));

    const next = new Map<string, string>();
    for (const [friendly, remoteName] of Object.entries(this.config.current.servers)) {
      next.set(friendly, idByName.get(remoteName) ?? remoteName);
    }

    this.entries = next;
    this.lastRefresh = new Date();

    logger.info('Server map refreshed', {
      component: 'ServerMapService',
      operation: 'refresh',
      metadata: { serverMap: Object.fromEntries(next) }
    });

    return next;
  }

  resolve(friendlyName: string): string | undefined {
    return this.entries.get(friendlyName);
  }

  names(): string[] {
    return Array.from(this.entries.keys());
  }

  snapshot(): ReadonlyMap<string, string> {
    return this.entries;
  }

  getLastRefresh(): Date | null {
    return this.lastRefresh;
  }
}
