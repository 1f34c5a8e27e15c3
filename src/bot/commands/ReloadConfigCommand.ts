import { MessageFlags } from 'discord.js';
import { logger } from '../../utils/logger';
import { CommandContext, CommandHandler } from './CommandHandler';

/**
 * Command to re-read the configuration file and rebind channels
 * Usage: /reload-config
 */
export class ReloadConfigCommand extends CommandHandler {
  readonly name = 'reload-config';
  readonly description = 'Reload the bot configuration';

  async execute(context: CommandContext): Promise<void> {
    const { interaction, bot, requestId } = context;

    await interaction.deferReply({ flags: MessageFlags.Ephemeral });

    bot.config.reload();
    await bot.serverMap.refresh();

    for (const guild of interaction.client.guilds.cache.values()) {
      await bot.channels.ensureChannelsForGuild(guild);
    }
    bot.channels.reschedule();

    logger.info('Configuration reloaded from command', {
      component: 'ReloadConfigCommand',
      operation: 'reload_config',
      userId: interaction.user.id,
      requestId
    });

    await interaction.editReply('✅ Config reloaded.');
  }
}
