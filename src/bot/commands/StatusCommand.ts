import { ServerPublicStatus } from '../../models';
import { CommandContext } from './CommandHandler';
import { ServerCommand } from './ServerCommand';

function show(value: boolean | number | undefined): string {
  return value === undefined ? 'unknown' : String(value);
}

export function formatStatus(server: string, status: ServerPublicStatus): string {
  return `📊 ${server} — running: ${show(status.running)}, players: ${show(status.online)}/${show(status.max)}`;
}

/**
 * Command to show whether a server runs and how many players are online
 * Usage: /status server:<name>
 */
export class StatusCommand extends ServerCommand {
  readonly name = 'status';
  readonly description = 'Show the status of a Crafty server';

  async execute(context: CommandContext): Promise<void> {
    const target = await this.resolveServer(context);
    if (!target) return;

    const { interaction, bot } = context;
    await interaction.deferReply();
    const status = await bot.crafty.getPublicStatus(target.serverId);
    await interaction.editReply(formatStatus(target.server, status));
  }
}
