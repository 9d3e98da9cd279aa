/**
 * Voice module exports
 * This serves as the main entry point for voice session functionality
 */

// Connection info
export {
  ConnectionInfoAssembler,
  isCompleteConnectionInfo,
  type ConnectionInfoAssemblerOptions,
  type VoiceStateIngestResult,
} from './connectionInfoAssembler';

// Nodes
export { NodeData, type NodeDataValue } from './nodeData';
export { NodeRegistry, cloneNode } from './nodeRegistry';

// Queue loops
export { QueueLoopManager, toPlayOptions, type LoopStateListener } from './queueLoopManager';

// Events
export {
  EventDispatcher,
  defaultScheduler,
  type ErrorReporter,
  type EventDispatcherOptions,
} from './eventDispatcher';

// Backends
export {
  LavalinkBackend,
  parseFrame,
  DEFAULT_CLIENT_NAME,
  type LavalinkBackendOptions,
  type SocketFactory,
} from './lavalinkBackend';
export { DiscordVoiceGateway, type DiscordVoiceGatewayOptions } from './discordGateway';

// Facade
export { VoiceCoordinator, SEARCH_PREFIX, type VoiceCoordinatorOptions } from './voiceCoordinator';

export * from './constants';
