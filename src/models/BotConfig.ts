/**
 * How the bot authenticates against Crafty
 */
export type CraftyCredentials =
  | { type: 'bearer'; token: string }
  | { type: 'password'; username: string; password: string };

/**
 * Crafty API connection settings
 */
export interface CraftySettings {
  /** Base URL without trailing slash (e.g. "https://crafty.local:8443") */
  baseUrl: string;

  /** API version prefix prepended to every path */
  apiPrefix: string;

  credentials: CraftyCredentials;

  /** Whether TLS certificates are verified */
  verifySsl: boolean;

  /** Per-request timeout in seconds */
  requestTimeout: number;
}

/**
 * Callers allowed to use the commands
 */
export interface AuthorizationSet {
  userIds: ReadonlySet<string>;
  roleNames: ReadonlySet<string>;
}

/**
 * Complete bot configuration
 */
export interface BotConfig {
  /** Seconds between two channel reconciliation cycles */
  updateInterval: number;

  /** Minimum seconds between two renames of the same channel */
  channelCooldown: number;

  /** Category holding the server status channels */
  categoryName: string;

  authorization: AuthorizationSet;

  /** Friendly name -> Crafty server name (or id) */
  servers: Record<string, string>;

  discordToken: string | undefined;

  crafty: CraftySettings;
}
