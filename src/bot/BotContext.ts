import type { ChannelStatusManager } from './managers/ChannelStatusManager';
import type { ConfigStore } from '../services/ConfigStore';
import type { CraftyClient } from '../services/CraftyClient';
import type { ServerMapService } from '../services/ServerMapService';

/**
 * Shared application state handed to commands and the reconciler
 */
export interface BotContext {
  config: ConfigStore;
  crafty: CraftyClient;
  serverMap: ServerMapService;
  channels: ChannelStatusManager;
}
