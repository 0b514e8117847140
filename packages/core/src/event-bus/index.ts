/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Export all event bus types and implementations
export type {
  ActivityEvent,
  ActivityReporter,
  AgentLabel,
  ChannelCategory,
  ClientMessageHandler,
  MessageHandler,
  ResultEvent,
} from './types.js';
export {
  ACTIVITY_PATTERN,
  RESULT_PATTERN,
  activityChannel,
  parseChannel,
  resultChannel,
  silentReporter,
} from './types.js';

export type { MessageBroker, Unsubscribe } from './broker.js';
export { globToRegExp } from './broker.js';
export { InMemoryBroker } from './memoryBroker.js';
export { RedisBroker } from './redisBroker.js';
export { ProgressBus } from './progressBus.js';
export { ConnectionRegistry, CLOSE_REPLACED, CLOSE_SHUTDOWN, type LiveConnection } from './connectionRegistry.js';
export {
  WebSocketConnection,
  parseClientPath,
  startConnectionGateway,
  type GatewayHandle,
  type GatewayOptions,
} from './wsGateway.js';
