import { CategoryChannel, ChannelType, Client, Guild, VoiceChannel } from 'discord.js';
import { GuildChannelBindings, SyncReport } from '../../models';
import type { ConfigStore } from '../../services/ConfigStore';
import type { CraftyClient } from '../../services/CraftyClient';
import type { ServerMapService } from '../../services/ServerMapService';
import { extractErrorInfo, toError } from '../../utils/errorHandler';
import { logger } from '../../utils/logger';

export interface ChannelStatusOptions {
  /** Clock used for rename cooldowns, in milliseconds */
  now?: () => number;
}

/**
 * "survival" -> "Survival", "SMP" -> "Smp"
 */
export function displayName(friendlyName: string): string {
  if (friendlyName.length === 0) {
    return friendlyName;
  }
  return friendlyName.charAt(0).toUpperCase() + friendlyName.slice(1).toLowerCase();
}

/**
 * Channel name for a server; anything but running shows as offline
 */
export function formatChannelName(friendlyName: string, running: boolean): string {
  return running
    ? `🟢 ${displayName(friendlyName)}: Online`
    : `🔴 ${displayName(friendlyName)}: Offline`;
}

export function placeholderChannelName(friendlyName: string): string {
  return `🔄 ${displayName(friendlyName)}...`;
}

function emptyReport(): SyncReport {
  return {
    completed: false,
    renamed: 0,
    unchanged: 0,
    cooldown: 0,
    failed: 0,
    skipped: 0,
    duration: 0
  };
}

/**
 * Keeps one voice channel per configured server and renames it to reflect
 * whether the server is running. Renames of a channel are spaced by the
 * configured cooldown.
 */
export class ChannelStatusManager {
  private bindings: Map<string, GuildChannelBindings> = new Map();
  private lastRenameAt: Map<string, number> = new Map();
  private syncInterval: NodeJS.Timeout | null = null;
  private activeIntervalSeconds: number | null = null;
  private isSyncing = false;
  private readonly now: () => number;

  constructor(
    private readonly client: Client,
    private readonly crafty: CraftyClient,
    private readonly serverMap: ServerMapService,
    private readonly config: ConfigStore,
    options: ChannelStatusOptions = {}
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Locate or create the category and one voice channel per configured server,
   * then record the bindings for this guild.
   */
  async ensureChannelsForGuild(guild: Guild): Promise<GuildChannelBindings> {
    const { categoryName, servers } = this.config.current;

    let category = guild.channels.cache.find(
      (channel): channel is CategoryChannel =>
        channel.type === ChannelType.GuildCategory && channel.name === categoryName
    );

    if (!category) {
      category = await guild.channels.create({
        name: categoryName,
        type: ChannelType.GuildCategory
      });

      logger.info('Created server status category', {
        component: 'ChannelStatusManager',
        operation: 'ensure_channels',
        guildId: guild.id,
        metadata: { categoryName, categoryId: category.id }
      });
    }

    const categoryId = category.id;
    const next = new Map<string, string>();

    for (const friendlyName of Object.keys(servers)) {
      const needle = friendlyName.toLowerCase();

      // first match wins when several channels contain the name
      const existing = guild.channels.cache.find(
        (channel): channel is VoiceChannel =>
          channel.type === ChannelType.GuildVoice &&
          channel.parentId === categoryId &&
          channel.name.toLowerCase().includes(needle)
      );

      if (existing) {
        next.set(friendlyName, existing.id);
        continue;
      }

      const created = await guild.channels.create({
        name: placeholderChannelName(friendlyName),
        type: ChannelType.GuildVoice,
        parent: categoryId
      });
      next.set(friendlyName, created.id);

      logger.info('Created server status channel', {
        component: 'ChannelStatusManager',
        operation: 'ensure_channels',
        guildId: guild.id,
        metadata: { friendlyName, channelId: created.id }
      });
    }

    this.releaseChannels(this.bindings.get(guild.id), new Set(next.values()));
    this.bindings.set(guild.id, next);
    return next;
  }

  /**
   * Drop the bindings of a guild the bot left
   */
  forgetGuild(guildId: string): void {
    this.releaseChannels(this.bindings.get(guildId), new Set());
    this.bindings.delete(guildId);
  }

  /**
   * Drop rename timestamps of channels that are no longer bound
   */
  private releaseChannels(previous: GuildChannelBindings | undefined, stillBound: ReadonlySet<string>): void {
    if (!previous) return;

    for (const channelId of previous.values()) {
      if (!stillBound.has(channelId)) {
        this.lastRenameAt.delete(channelId);
      }
    }
  }

  getBindings(guildId: string): GuildChannelBindings | undefined {
    return this.bindings.get(guildId);
  }

  /**
   * Start the periodic synchronization
   */
  public start(): void {
    if (this.syncInterval) {
      logger.warn('ChannelStatusManager already running', {
        component: 'ChannelStatusManager',
        operation: 'start'
      });
      return;
    }

    const intervalSeconds = this.config.current.updateInterval;
    this.activeIntervalSeconds = intervalSeconds;

    this.performSync().catch(error => {
      logger.error('Initial channel sync failed', {
        component: 'ChannelStatusManager',
        operation: 'initial_sync'
      }, toError(error));
    });

    this.syncInterval = setInterval(async () => {
      try {
        await this.performSync();
      } catch (error) {
        logger.error('Periodic channel sync failed', {
          component: 'ChannelStatusManager',
          operation: 'periodic_sync'
        }, toError(error));
      }
    }, intervalSeconds * 1000);

    logger.info('ChannelStatusManager started', {
      component: 'ChannelStatusManager',
      operation: 'start',
      metadata: { intervalMs: intervalSeconds * 1000 }
    });
  }

  /**
   * Stop the periodic synchronization; bindings are kept
   */
  public stop(): void {
    if (this.syncInterval) {
      clearInterval(this.syncInterval);
      this.syncInterval = null;
    }
    this.activeIntervalSeconds = null;
  }

  /**
   * Restart the timer if the configured interval changed since start()
   */
  public reschedule(): void {
    if (!this.syncInterval || this.activeIntervalSeconds === this.config.current.updateInterval) {
      return;
    }

    logger.info('Update interval changed, rescheduling', {
      component: 'ChannelStatusManager',
      operation: 'reschedule',
      metadata: {
        previous: this.activeIntervalSeconds,
        next: this.config.current.updateInterval
      }
    });

    this.stop();
    this.start();
  }

  public isRunning(): boolean {
    return this.syncInterval !== null;
  }

  /**
   * One reconciliation cycle over every bound guild
   */
  public async performSync(): Promise<SyncReport> {
    const report = emptyReport();

    if (this.isSyncing) {
      logger.debug('Previous channel sync still running, skipping', {
        component: 'ChannelStatusManager',
        operation: 'sync_skip'
      });
      return report;
    }

    this.isSyncing = true;
    const startTime = Date.now();

    try {
      try {
        await this.serverMap.refresh();
      } catch (error) {
        logger.warn('Could not refresh server map, skipping cycle', {
          component: 'ChannelStatusManager',
          operation: 'sync_refresh',
          metadata: { ...extractErrorInfo(error) }
        });
        return report;
      }

      for (const [guildId, guildBindings] of this.bindings) {
        const guild = this.client.guilds.cache.get(guildId);
        if (!guild) {
          logger.warn(`Guild ${guildId} not found`, {
            component: 'ChannelStatusManager',
            operation: 'sync_guild',
            guildId
          });
          continue;
        }

        for (const [friendlyName, channelId] of guildBindings) {
          await this.syncChannel(guild, friendlyName, channelId, report);
        }
      }

      report.completed = true;
      return report;
    } finally {
      report.duration = Date.now() - startTime;
      this.isSyncing = false;

      logger.debug('Channel sync finished', {
        component: 'ChannelStatusManager',
        operation: 'sync_complete',
        metadata: { ...report }
      });
    }
  }

  private async syncChannel(
    guild: Guild,
    friendlyName: string,
    channelId: string,
    report: SyncReport
  ): Promise<void> {
    const serverId = this.serverMap.resolve(friendlyName);
    if (!serverId) {
      report.skipped++;
      return;
    }

    try {
      const stats = await this.crafty.getStats(serverId);
      const desiredName = formatChannelName(friendlyName, stats.running === true);

      const channel = guild.channels.cache.get(channelId);
      if (!channel || !channel.isVoiceBased()) {
        logger.debug('Bound channel no longer exists', {
          component: 'ChannelStatusManager',
          operation: 'sync_channel',
          guildId: guild.id,
          metadata: { friendlyName, channelId }
        });
        report.skipped++;
        return;
      }

      if (channel.name === desiredName) {
        report.unchanged++;
        return;
      }

      const now = this.now();
      const cooldownMs = this.config.current.channelCooldown * 1000;
      const lastRename = this.lastRenameAt.get(channel.id);

      if (lastRename !== undefined && now - lastRename < cooldownMs) {
        logger.channelCooldown(channel.name, cooldownMs - (now - lastRename), { guildId: guild.id });
        report.cooldown++;
        return;
      }

      await channel.setName(desiredName);
      this.lastRenameAt.set(channel.id, now);
      report.renamed++;
    } catch (error) {
      logger.warn(`Failed to update server ${friendlyName}`, {
        component: 'ChannelStatusManager',
        operation: 'sync_channel',
        guildId: guild.id,
        metadata: { serverId, ...extractErrorInfo(error) }
      });
      report.failed++;
    }
  }
}
