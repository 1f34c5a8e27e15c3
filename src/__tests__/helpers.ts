import { BotConfig, CraftySettings } from '../models';
import { ConfigStore } from '../services/ConfigStore';

export function makeCraftySettings(overrides: Partial<CraftySettings> = {}): CraftySettings {
  return {
    baseUrl: 'https://crafty.test',
    apiPrefix: '/api/v2',
    credentials: { type: 'password', username: 'admin', password: 'test-secret' },
    verifySsl: true,
    requestTimeout: 15,
    ...overrides
  };
}

export function makeBotConfig(overrides: Partial<BotConfig> = {}): BotConfig {
  return {
    updateInterval: 60,
    channelCooldown: 15,
    categoryName: 'Crafty Servers',
    authorization: {
      userIds: new Set(['111111111111111111']),
      roleNames: new Set(['Admin'])
    },
    servers: { survival: 'SMP' },
    discordToken: undefined,
    crafty: makeCraftySettings(),
    ...overrides
  };
}

export function makeConfigStore(overrides: Partial<BotConfig> = {}): ConfigStore {
  const config = makeBotConfig(overrides);
  return new ConfigStore(() => config);
}
