/**
 * Actions accepted by POST /servers/{id}/action/{action}
 */
export type ServerAction = 'start_server' | 'stop_server' | 'restart_server';

/**
 * Entry of GET /servers
 */
export interface ServerDescriptor {
  id: string;
  name: string;
  running?: boolean;
  online?: number;
  max?: number;
}

/**
 * Payload of GET /servers/{id}/public
 */
export interface ServerPublicStatus {
  running?: boolean;
  online?: number;
  max?: number;
}

/**
 * Part of GET /servers/{id}/stats the bot reads; other fields are dropped
 */
export interface ServerStats {
  running: boolean;
}
