import {
  AutocompleteInteraction,
  ChatInputCommandInteraction,
  MessageFlags,
  SlashCommandBuilder,
  SlashCommandOptionsOnlyBuilder
} from 'discord.js';
import { AuthorizationSet } from '../../models';
import type { BotContext } from '../BotContext';

/**
 * Interface for bot command context
 */
export interface CommandContext {
  interaction: ChatInputCommandInteraction;
  bot: BotContext;
  requestId: string;
}

/**
 * Who invoked a command
 */
export interface CallerIdentity {
  id: string;
  roleNames: string[];
}

export type CommandData = SlashCommandBuilder | SlashCommandOptionsOnlyBuilder;

/**
 * Resolve the caller's id and role names from an interaction
 */
export function describeCaller(interaction: ChatInputCommandInteraction): CallerIdentity {
  const member = interaction.member;
  let roleNames: string[] = [];

  if (member) {
    if (Array.isArray(member.roles)) {
      // uncached member: only role ids are known
      roleNames = member.roles
        .map(roleId => interaction.guild?.roles.cache.get(roleId)?.name)
        .filter((name): name is string => name !== undefined);
    } else {
      roleNames = member.roles.cache.map(role => role.name);
    }
  }

  return { id: interaction.user.id, roleNames };
}

/**
 * Allowed if the caller's id is listed or any of their role names is
 */
export function isAuthorized(caller: CallerIdentity, authorization: AuthorizationSet): boolean {
  if (authorization.userIds.has(caller.id)) {
    return true;
  }
  return caller.roleNames.some(roleName => authorization.roleNames.has(roleName));
}

/**
 * Base class for bot commands
 */
export abstract class CommandHandler {
  /** Command name */
  abstract readonly name: string;

  /** Command description */
  abstract readonly description: string;

  /**
   * Execute the command
   */
  abstract execute(context: CommandContext): Promise<void>;

  /**
   * Slash command definition handed to Discord
   */
  buildData(): CommandData {
    return new SlashCommandBuilder()
      .setName(this.name)
      .setDescription(this.description);
  }

  /**
   * Check if user has permission to execute this command
   */
  checkPermissions(context: CommandContext): boolean {
    const caller = describeCaller(context.interaction);
    return isAuthorized(caller, context.bot.config.current.authorization);
  }

  /**
   * Answer an autocomplete request for this command
   */
  async autocomplete(interaction: AutocompleteInteraction, _bot: BotContext): Promise<void> {
    await interaction.respond([]);
  }

  /**
   * Reply visible only to the caller
   */
  protected async replyPrivately(interaction: ChatInputCommandInteraction, content: string): Promise<void> {
    await interaction.reply({ content, flags: MessageFlags.Ephemeral });
  }
}
