import { makeBotConfig } from '../../__tests__/helpers';
import { BotConfig, ConfigurationError } from '../../models';
import { ConfigStore } from '../ConfigStore';

describe('ConfigStore', () => {
  it('should load the configuration on construction', () => {
    const config = makeBotConfig();
    const store = new ConfigStore(() => config);

    expect(store.current).toBe(config);
  });

  it('should replace the configuration on reload', () => {
    const first = makeBotConfig();
    const second = makeBotConfig({ updateInterval: 30 });
    const loader = jest.fn<BotConfig, []>()
      .mockReturnValueOnce(first)
      .mockReturnValueOnce(second);
    const store = new ConfigStore(loader);

    expect(store.reload()).toBe(second);
    expect(store.current.updateInterval).toBe(30);
  });

  it('should keep the previous configuration when reload fails', () => {
    const first = makeBotConfig();
    const loader = jest.fn<BotConfig, []>()
      .mockReturnValueOnce(first)
      .mockImplementationOnce(() => {
        throw new ConfigurationError('Invalid configuration: "crafty" is required');
      });
    const store = new ConfigStore(loader);

    expect(() => store.reload()).toThrow(ConfigurationError);
    expect(store.current).toBe(first);
  });
});
