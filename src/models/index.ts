// Data models and interfaces
export * from './BotConfig';
export * from './CraftyServer';
export * from './ChannelStatus';

// Error types
export * from './ErrorTypes';
