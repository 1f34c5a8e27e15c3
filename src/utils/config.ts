import dotenv from 'dotenv';
import fs from 'fs';
import { parse } from 'yaml';
import { BotConfig, ConfigurationError, CraftyCredentials, CraftySettings } from '../models';
import { RawBotConfig, RawCraftySection, ValidationUtils } from './validation';

// Load environment variables
dotenv.config();

export const DEFAULT_CONFIG_PATH = 'config.yaml';

/**
 * Path of the YAML configuration document
 */
export function getConfigPath(): string {
  return process.env['CRAFTY_CONFIG'] || DEFAULT_CONFIG_PATH;
}

/**
 * Integers are parsed as bigint so that unquoted Discord snowflakes keep every
 * digit; anything outside the safe range is kept as its decimal string.
 */
function normalizeIntegers(value: unknown): unknown {
  if (typeof value === 'bigint') {
    const asNumber = Number(value);
    return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
  }

  if (Array.isArray(value)) {
    return value.map(normalizeIntegers);
  }

  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, normalizeIntegers(entry)])
    );
  }

  return value;
}

function toCredentials(crafty: RawCraftySection): CraftyCredentials {
  if (crafty.bearer_token) {
    return { type: 'bearer', token: crafty.bearer_token };
  }

  if (crafty.username && crafty.password) {
    return { type: 'password', username: crafty.username, password: crafty.password };
  }

  throw new ConfigurationError('crafty needs either bearer_token or username/password');
}

function toCraftySettings(crafty: RawCraftySection): CraftySettings {
  return {
    baseUrl: crafty.base_url.replace(/\/+$/, ''),
    apiPrefix: crafty.api_prefix.replace(/\/+$/, ''),
    credentials: toCredentials(crafty),
    verifySsl: crafty.verify_ssl,
    requestTimeout: crafty.request_timeout
  };
}

/**
 * Map the validated YAML document to the application configuration
 */
export function toBotConfig(raw: RawBotConfig): BotConfig {
  const servers: Record<string, string> = {};
  for (const [friendly, remote] of Object.entries(raw.servers)) {
    servers[friendly] = String(remote);
  }

  return {
    updateInterval: raw.update_interval,
    channelCooldown: raw.channel_cooldown,
    categoryName: raw.category_name,
    authorization: {
      userIds: new Set(raw.allowed_user_ids.map(String)),
      roleNames: new Set(raw.allowed_role_names)
    },
    servers,
    discordToken: raw.discord_token || undefined,
    crafty: toCraftySettings(raw.crafty)
  };
}

/**
 * Parse and validate a YAML configuration document
 */
export function parseBotConfig(source: string): BotConfig {
  let document: unknown;
  try {
    document = parse(source, { intAsBigInt: true });
  } catch (error) {
    throw new ConfigurationError('Configuration is not valid YAML', [], error);
  }

  const result = ValidationUtils.validateBotConfig(normalizeIntegers(document), {
    component: 'Config'
  });

  if (!result.isValid || !result.data) {
    const summary = (result.errors ?? []).map(error => error.message).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${summary}`, result.errors);
  }

  return toBotConfig(result.data);
}

/**
 * Load configuration from the YAML file
 */
export function loadBotConfig(path: string = getConfigPath()): BotConfig {
  let source: string;
  try {
    source = fs.readFileSync(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Unable to read configuration file ${path}`, [], error);
  }

  return parseBotConfig(source);
}

/**
 * Discord bot token: environment first, then the configuration document
 */
export function resolveDiscordToken(config: BotConfig): string | undefined {
  return process.env['DISCORD_TOKEN'] || config.discordToken || undefined;
}
