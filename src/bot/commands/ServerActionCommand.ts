import { ServerAction } from '../../models';
import { CommandContext } from './CommandHandler';
import { ServerCommand } from './ServerCommand';

/**
 * Commands that trigger a Crafty server action
 */
export abstract class ServerActionCommand extends ServerCommand {
  abstract readonly action: ServerAction;

  protected abstract formatResult(server: string): string;

  async execute(context: CommandContext): Promise<void> {
    const target = await this.resolveServer(context);
    if (!target) return;

    const { interaction, bot } = context;
    await interaction.deferReply();
    await bot.crafty.performAction(target.serverId, this.action);
    await interaction.editReply(this.formatResult(target.server));
  }
}
