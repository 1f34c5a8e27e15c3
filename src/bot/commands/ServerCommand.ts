import { AutocompleteInteraction, SlashCommandBuilder } from 'discord.js';
import type { BotContext } from '../BotContext';
import { CommandContext, CommandData, CommandHandler } from './CommandHandler';

/** Discord accepts at most 25 autocomplete choices */
const MAX_CHOICES = 25;

export interface ResolvedServer {
  /** Friendly name as typed by the caller */
  server: string;
  /** Crafty server id */
  serverId: string;
}

/**
 * Base class for commands taking a `server` argument
 */
export abstract class ServerCommand extends CommandHandler {
  override buildData(): CommandData {
    return new SlashCommandBuilder()
      .setName(this.name)
      .setDescription(this.description)
      .addStringOption(option =>
        option
          .setName('server')
          .setDescription('Server name')
          .setRequired(true)
          .setAutocomplete(true)
      );
  }

  override async autocomplete(interaction: AutocompleteInteraction, bot: BotContext): Promise<void> {
    const typed = interaction.options.getFocused().toLowerCase();
    const choices = bot.serverMap
      .names()
      .filter(name => name.toLowerCase().includes(typed))
      .slice(0, MAX_CHOICES)
      .map(name => ({ name, value: name }));

    await interaction.respond(choices);
  }

  /**
   * Look the server up in the server map; tells the caller when it is unknown
   */
  protected async resolveServer(context: CommandContext): Promise<ResolvedServer | null> {
    const { interaction, bot } = context;
    const server = interaction.options.getString('server', true);
    const serverId = bot.serverMap.resolve(server);

    if (!serverId) {
      await this.replyPrivately(interaction, `❌ Unknown server ${server}`);
      return null;
    }

    return { server, serverId };
  }
}
