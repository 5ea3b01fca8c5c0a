export { MqttClientWrapper, createMqttClient } from './client.js';
export type { MqttClientEvents, ConnectionState } from './client.js';
export { MessageHandler, createMessageHandler, attachHandler } from './handler.js';
export type { MessageHandlerDeps, MessageStats } from './handler.js';
