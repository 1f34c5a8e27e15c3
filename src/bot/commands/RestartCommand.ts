import { ServerAction } from '../../models';
import { ServerActionCommand } from './ServerActionCommand';

/**
 * Usage: /restart server:<name>
 */
export class RestartCommand extends ServerActionCommand {
  readonly name = 'restart';
  readonly description = 'Restart a Crafty server';
  readonly action: ServerAction = 'restart_server';

  protected formatResult(server: string): string {
    return `🔁 Restarting ${server}`;
  }
}
