/**
 * Friendly server name -> voice channel id, for one guild
 */
export type GuildChannelBindings = ReadonlyMap<string, string>;

/**
 * Outcome of one reconciliation cycle
 */
export interface SyncReport {
  /** Whether the cycle ran at all (false when the server map could not be refreshed) */
  completed: boolean;
  renamed: number;
  unchanged: number;
  cooldown: number;
  failed: number;
  skipped: number;
  duration: number;
}
