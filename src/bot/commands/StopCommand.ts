import { ServerAction } from '../../models';
import { ServerActionCommand } from './ServerActionCommand';

/**
 * Usage: /stop server:<name>
 */
export class StopCommand extends ServerActionCommand {
  readonly name = 'stop';
  readonly description = 'Stop a Crafty server';
  readonly action: ServerAction = 'stop_server';

  protected formatResult(server: string): string {
    return `🛑 Stopping ${server}`;
  }
}
