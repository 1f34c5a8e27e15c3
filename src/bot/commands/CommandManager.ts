import {
  AutocompleteInteraction,
  ChatInputCommandInteraction,
  Client,
  Events,
  Interaction,
  MessageFlags
} from 'discord.js';
import { extractErrorInfo, generateRequestId, toError } from '../../utils/errorHandler';
import { LogContext, logger } from '../../utils/logger';
import type { BotContext } from '../BotContext';
import { CommandContext, CommandHandler } from './CommandHandler';

// Import all command handlers
import { ReloadConfigCommand } from './ReloadConfigCommand';
import { RestartCommand } from './RestartCommand';
import { StartCommand } from './StartCommand';
import { StatusCommand } from './StatusCommand';
import { StopCommand } from './StopCommand';

export const COMMAND_FAILED_MESSAGE = '⚠️ Command failed, check the bot logs.';

/**
 * Manages slash commands and routes interactions to them
 */
export class CommandManager {
  private commands: Map<string, CommandHandler> = new Map();
  private client: Client;
  private bot: BotContext;

  constructor(client: Client, bot: BotContext) {
    this.client = client;
    this.bot = bot;
    this.initializeCommands();
    this.setupEventListeners();
  }

  /**
   * Initialize all command handlers
   */
  private initializeCommands(): void {
    const commandHandlers = [
      new StartCommand(),
      new StopCommand(),
      new RestartCommand(),
      new StatusCommand(),
      new ReloadConfigCommand()
    ];

    commandHandlers.forEach(command => {
      this.commands.set(command.name, command);
    });

    logger.debug(`Registered ${this.commands.size} bot commands`, {
      component: 'CommandManager',
      operation: 'initialize'
    });
  }

  /**
   * Setup Discord event listeners
   */
  private setupEventListeners(): void {
    this.client.on(Events.InteractionCreate, this.handleInteraction.bind(this));
  }

  /**
   * Hand the command definitions to Discord
   */
  public async registerSlashCommands(): Promise<number> {
    const application = this.client.application;
    if (!application) {
      throw new Error('Client application is not available before ready');
    }

    const definitions = this.getCommands().map(command => command.buildData().toJSON());
    const synced = await application.commands.set(definitions);

    logger.info(`Synced ${synced.size} commands`, {
      component: 'CommandManager',
      operation: 'register_commands'
    });

    return synced.size;
  }

  /**
   * Route an incoming interaction
   */
  public async handleInteraction(interaction: Interaction): Promise<void> {
    if (interaction.isAutocomplete()) {
      await this.handleAutocomplete(interaction);
      return;
    }

    if (interaction.isChatInputCommand()) {
      await this.handleCommand(interaction);
    }
  }

  private async handleCommand(interaction: ChatInputCommandInteraction): Promise<void> {
    const command = this.commands.get(interaction.commandName);
    if (!command) return;

    const context: CommandContext = {
      interaction,
      bot: this.bot,
      requestId: generateRequestId()
    };

    const logContext: LogContext = {
      component: 'CommandManager',
      operation: `command_${command.name}`,
      userId: interaction.user.id,
      requestId: context.requestId,
      guildId: interaction.guildId ?? undefined
    };

    try {
      if (!command.checkPermissions(context)) {
        logger.info('Unauthorized command attempt', logContext);
        await interaction.reply({ content: '⛔ Unauthorized', flags: MessageFlags.Ephemeral });
        return;
      }

      await command.execute(context);
    } catch (error) {
      logger.error(`Command /${command.name} failed`, {
        ...logContext,
        metadata: { ...extractErrorInfo(error) }
      }, toError(error));

      await this.reportFailure(interaction, logContext);
    }
  }

  /**
   * Close the interaction after a failed command so the caller is not left waiting
   */
  private async reportFailure(interaction: ChatInputCommandInteraction, logContext: LogContext): Promise<void> {
    try {
      if (interaction.deferred) {
        await interaction.editReply(COMMAND_FAILED_MESSAGE);
      } else if (interaction.replied) {
        await interaction.followUp({ content: COMMAND_FAILED_MESSAGE, flags: MessageFlags.Ephemeral });
      } else {
        await interaction.reply({ content: COMMAND_FAILED_MESSAGE, flags: MessageFlags.Ephemeral });
      }
    } catch (replyError) {
      logger.warn('Could not report command failure', {
        ...logContext,
        metadata: { ...extractErrorInfo(replyError) }
      });
    }
  }

  private async handleAutocomplete(interaction: AutocompleteInteraction): Promise<void> {
    const command = this.commands.get(interaction.commandName);
    if (!command) return;

    try {
      await command.autocomplete(interaction, this.bot);
    } catch (error) {
      logger.warn('Autocomplete failed', {
        component: 'CommandManager',
        operation: `autocomplete_${command.name}`,
        userId: interaction.user.id,
        metadata: { ...extractErrorInfo(error) }
      });
    }
  }

  /**
   * Get all registered commands
   */
  public getCommands(): CommandHandler[] {
    return Array.from(this.commands.values());
  }
}
