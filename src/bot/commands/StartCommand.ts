import { ServerAction } from '../../models';
import { ServerActionCommand } from './ServerActionCommand';

/**
 * Usage: /start server:<name>
 */
export class StartCommand extends ServerActionCommand {
  readonly name = 'start';
  readonly description = 'Start a Crafty server';
  readonly action: ServerAction = 'start_server';

  protected formatResult(server: string): string {
    return `✅ Starting ${server}`;
  }
}
