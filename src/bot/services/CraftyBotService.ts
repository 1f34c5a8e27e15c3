import { Client, Events, GatewayIntentBits, Guild } from 'discord.js';
import type { ConfigStore } from '../../services/ConfigStore';
import { CraftyClient } from '../../services/CraftyClient';
import { ServerMapService } from '../../services/ServerMapService';
import { extractErrorInfo, toError } from '../../utils/errorHandler';
import { logger } from '../../utils/logger';
import type { BotContext } from '../BotContext';
import { CommandManager } from '../commands/CommandManager';
import { ChannelStatusManager } from '../managers/ChannelStatusManager';

/**
 * Collaborators of the bot service; any left out are built from the configuration
 */
export interface CraftyBotDependencies {
  client: Client;
  crafty: CraftyClient;
  serverMap: ServerMapService;
  channels: ChannelStatusManager;
}

/**
 * Main Discord bot service that manages the bot connection and integrates all components
 */
export class CraftyBotService {
  private readonly client: Client;
  private readonly context: BotContext;
  private readonly commandManager: CommandManager;
  private isReady = false;

  constructor(config: ConfigStore, overrides: Partial<CraftyBotDependencies> = {}) {
    this.client = overrides.client ?? new Client({
      intents: [GatewayIntentBits.Guilds]
    });

    const crafty = overrides.crafty ?? new CraftyClient(config.current.crafty);
    const serverMap = overrides.serverMap ?? new ServerMapService(crafty, config);
    const channels = overrides.channels ?? new ChannelStatusManager(this.client, crafty, serverMap, config);

    this.context = { config, crafty, serverMap, channels };
    this.commandManager = new CommandManager(this.client, this.context);

    this.setupEventListeners();
  }

  /**
   * Setup Discord client event listeners
   */
  private setupEventListeners(): void {
    this.client.once(Events.ClientReady, this.onReady.bind(this));
    this.client.on(Events.Error, this.onError.bind(this));
    this.client.on(Events.Warn, this.onWarn.bind(this));
    this.client.on(Events.GuildCreate, this.onGuildJoin.bind(this));
    this.client.on(Events.GuildDelete, this.onGuildLeave.bind(this));
  }

  /**
   * Handle bot ready event. Crafty being unreachable here only produces
   * warnings; the sync loop starts regardless.
   */
  private async onReady(client: Client<true>): Promise<void> {
    const { crafty, serverMap, channels } = this.context;

    logger.info('Discord bot ready', {
      component: 'CraftyBotService',
      operation: 'ready',
      metadata: {
        botTag: client.user.tag,
        botId: client.user.id
      }
    });

    try {
      await crafty.login();
    } catch (error) {
      logger.warn('Crafty not available yet, will retry in the sync loop', {
        component: 'CraftyBotService',
        operation: 'crafty_login',
        metadata: { ...extractErrorInfo(error) }
      });
    }

    try {
      await serverMap.refresh();
    } catch (error) {
      logger.warn('Could not build server map at startup', {
        component: 'CraftyBotService',
        operation: 'server_map',
        metadata: { ...extractErrorInfo(error) }
      });
    }

    for (const guild of client.guilds.cache.values()) {
      await this.bindGuild(guild);
    }

    try {
      await this.commandManager.registerSlashCommands();
    } catch (error) {
      logger.error('Failed to sync commands', {
        component: 'CraftyBotService',
        operation: 'register_commands'
      }, toError(error));
    }

    channels.start();
    this.isReady = true;

    logger.info('Crafty bot service fully initialized', {
      component: 'CraftyBotService',
      operation: 'initialization_complete',
      metadata: { guilds: client.guilds.cache.size }
    });
  }

  private async bindGuild(guild: Guild): Promise<void> {
    try {
      await this.context.channels.ensureChannelsForGuild(guild);
    } catch (error) {
      logger.warn(`Could not set up status channels in ${guild.name}`, {
        component: 'CraftyBotService',
        operation: 'ensure_channels',
        guildId: guild.id,
        metadata: { ...extractErrorInfo(error) }
      });
    }
  }

  /**
   * Handle bot errors
   */
  private onError(error: Error): void {
    logger.error('Discord client error', {
      component: 'CraftyBotService',
      operation: 'client_error'
    }, error);
  }

  /**
   * Handle bot warnings
   */
  private onWarn(warning: string): void {
    logger.warn('Discord client warning', {
      component: 'CraftyBotService',
      operation: 'client_warning',
      metadata: { warning }
    });
  }

  /**
   * Handle bot joining a new guild
   */
  private async onGuildJoin(guild: Guild): Promise<void> {
    logger.info(`Joined new guild: ${guild.name}`, {
      component: 'CraftyBotService',
      operation: 'guild_join',
      guildId: guild.id
    });

    await this.bindGuild(guild);
  }

  /**
   * Handle bot leaving a guild
   */
  private onGuildLeave(guild: Guild): void {
    this.context.channels.forgetGuild(guild.id);

    logger.info(`Left guild: ${guild.name}`, {
      component: 'CraftyBotService',
      operation: 'guild_leave',
      guildId: guild.id
    });
  }

  /**
   * Start the Discord bot
   */
  public async start(token: string): Promise<void> {
    try {
      logger.info('Starting Discord bot', {
        component: 'CraftyBotService',
        operation: 'start'
      });

      await this.client.login(token);

      logger.info('Discord bot login successful', {
        component: 'CraftyBotService',
        operation: 'login'
      });
    } catch (error) {
      logger.error('Failed to start Discord bot', {
        component: 'CraftyBotService',
        operation: 'start'
      }, toError(error));
      throw error;
    }
  }

  /**
   * Stop the Discord bot
   */
  public async stop(): Promise<void> {
    this.context.channels.stop();
    await this.client.destroy();
    await this.context.crafty.close();
    this.isReady = false;

    logger.info('Crafty bot service stopped', {
      component: 'CraftyBotService',
      operation: 'stop'
    });
  }

  /**
   * Get bot status
   */
  public getStatus(): { ready: boolean; guilds: number; syncing: boolean } {
    return {
      ready: this.isReady,
      guilds: this.client.guilds.cache.size,
      syncing: this.context.channels.isRunning()
    };
  }
}
