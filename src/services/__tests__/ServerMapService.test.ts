import { makeConfigStore } from '../../__tests__/helpers';
import { ServerDescriptor, TransportError } from '../../models';
import type { CraftyClient } from '../CraftyClient';
import { ServerMapService } from '../ServerMapService';

describe('ServerMapService', () => {
  let listServers: jest.Mock<Promise<ServerDescriptor[]>, []>;
  let serverMap: ServerMapService;

  beforeEach(() => {
    listServers = jest.fn();
    const crafty = { listServers } as unknown as CraftyClient;
    const config = makeConfigStore({
      servers: { survival: 'SMP', creative: '7' }
    });
    serverMap = new ServerMapService(crafty, config);
  });

  it('should map friendly names to the ids of matching remote servers', async () => {
    listServers.mockResolvedValueOnce([{ id: '42', name: 'SMP' }]);

    await serverMap.refresh();

    expect(serverMap.resolve('survival')).toBe('42');
  });

  it('should fall back to the configured value for unlisted servers', async () => {
    listServers.mockResolvedValueOnce([{ id: '42', name: 'SMP' }]);

    await serverMap.refresh();

    expect(serverMap.resolve('creative')).toBe('7');
    expect(serverMap.names()).toEqual(['survival', 'creative']);
  });

  it('should use the last server when remote names repeat', async () => {
    listServers.mockResolvedValueOnce([
      { id: '1', name: 'SMP' },
      { id: '2', name: 'SMP' }
    ]);

    await serverMap.refresh();

    expect(serverMap.resolve('survival')).toBe('2');
  });

  it('should keep the previous map when the list cannot be fetched', async () => {
    listServers.mockResolvedValueOnce([{ id: '42', name: 'SMP' }]);
    await serverMap.refresh();
    const before = serverMap.snapshot();
    const refreshedAt = serverMap.getLastRefresh();

    listServers.mockRejectedValueOnce(new TransportError('Crafty not reachable', false));

    await expect(serverMap.refresh()).rejects.toBeInstanceOf(TransportError);
    expect(serverMap.snapshot()).toBe(before);
    expect(Object.fromEntries(serverMap.snapshot())).toEqual({ survival: '42', creative: '7' });
    expect(serverMap.getLastRefresh()).toBe(refreshedAt);
  });

  it('should resolve nothing before the first refresh', () => {
    expect(serverMap.resolve('survival')).toBeUndefined();
    expect(serverMap.getLastRefresh()).toBeNull();
  });
});
