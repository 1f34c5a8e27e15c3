import { Client, Collection, Events } from 'discord.js';
import { makeConfigStore } from '../../__tests__/helpers';
import { TransportError } from '../../models';
import type { CraftyClient } from '../../services/CraftyClient';
import type { ServerMapService } from '../../services/ServerMapService';
import type { ChannelStatusManager } from '../managers/ChannelStatusManager';
import { CraftyBotService } from '../services/CraftyBotService';

type Listener = (...args: unknown[]) => unknown;

function listenerFor(mock: jest.Mock, event: string): Listener {
  const call = mock.mock.calls.find(([name]) => name === event);
  if (!call) {
    throw new Error(`No listener registered for ${event}`);
  }
  return call[1];
}

describe('CraftyBotService', () => {
  const guild = { id: '987654321098765432', name: 'Test Guild' };

  let mockClient: {
    once: jest.Mock;
    on: jest.Mock;
    login: jest.Mock;
    destroy: jest.Mock;
    user: { id: string; tag: string };
    guilds: { cache: Collection<string, typeof guild> };
    application: { commands: { set: jest.Mock } };
  };
  let crafty: { login: jest.Mock; close: jest.Mock };
  let serverMap: { refresh: jest.Mock };
  let channels: {
    ensureChannelsForGuild: jest.Mock;
    forgetGuild: jest.Mock;
    start: jest.Mock;
    stop: jest.Mock;
    isRunning: jest.Mock;
  };
  let service: CraftyBotService;

  beforeEach(() => {
    mockClient = {
      once: jest.fn(),
      on: jest.fn(),
      login: jest.fn().mockResolvedValue('token'),
      destroy: jest.fn().mockResolvedValue(undefined),
      user: { id: '333333333333333333', tag: 'CraftyBot#0001' },
      guilds: { cache: new Collection([[guild.id, guild]]) },
      application: { commands: { set: jest.fn().mockResolvedValue(new Collection()) } }
    };
    crafty = {
      login: jest.fn().mockResolvedValue('session-token'),
      close: jest.fn().mockResolvedValue(undefined)
    };
    serverMap = { refresh: jest.fn().mockResolvedValue(new Map()) };
    channels = {
      ensureChannelsForGuild: jest.fn().mockResolvedValue(new Map()),
      forgetGuild: jest.fn(),
      start: jest.fn(),
      stop: jest.fn(),
      isRunning: jest.fn().mockReturnValue(true)
    };

    service = new CraftyBotService(makeConfigStore(), {
      client: mockClient as unknown as Client,
      crafty: crafty as unknown as CraftyClient,
      serverMap: serverMap as unknown as ServerMapService,
      channels: channels as unknown as ChannelStatusManager
    });
  });

  it('should bind channels, sync commands and start the loop when ready', async () => {
    await listenerFor(mockClient.once, Events.ClientReady)(mockClient);

    expect(crafty.login).toHaveBeenCalled();
    expect(serverMap.refresh).toHaveBeenCalled();
    expect(channels.ensureChannelsForGuild).toHaveBeenCalledWith(guild);
    expect(mockClient.application.commands.set).toHaveBeenCalled();
    expect(channels.start).toHaveBeenCalled();
    expect(service.getStatus()).toEqual({ ready: true, guilds: 1, syncing: true });
  });

  it('should still start the loop when Crafty is unreachable at startup', async () => {
    crafty.login.mockRejectedValueOnce(new TransportError('Crafty not reachable', false));
    serverMap.refresh.mockRejectedValueOnce(new TransportError('Crafty not reachable', false));
    channels.ensureChannelsForGuild.mockRejectedValueOnce(new Error('Missing Permissions'));

    await listenerFor(mockClient.once, Events.ClientReady)(mockClient);

    expect(channels.start).toHaveBeenCalled();
    expect(mockClient.application.commands.set).toHaveBeenCalled();
  });

  it('should bind channels in guilds it joins', async () => {
    await listenerFor(mockClient.on, Events.GuildCreate)(guild);

    expect(channels.ensureChannelsForGuild).toHaveBeenCalledWith(guild);
  });

  it('should forget guilds it leaves', () => {
    listenerFor(mockClient.on, Events.GuildDelete)(guild);

    expect(channels.forgetGuild).toHaveBeenCalledWith(guild.id);
  });

  it('should log in with the given token', async () => {
    await service.start('test-token');

    expect(mockClient.login).toHaveBeenCalledWith('test-token');
  });

  it('should release everything on stop', async () => {
    await service.stop();

    expect(channels.stop).toHaveBeenCalled();
    expect(mockClient.destroy).toHaveBeenCalled();
    expect(crafty.close).toHaveBeenCalled();
  });
});
