export {
  compileTopicPattern,
  topicCaptures,
  matchesTopic,
  countSingleWildcards,
  compileTemplate,
  renderTemplate,
  staticText,
  compileRule,
  PointMapper,
  MappingEngine,
} from './mapping/index.js';
export type {
  TopicLevel,
  TopicPattern,
  Template,
  TemplatePart,
  CompiledRule,
  CompiledTag,
  PayloadSpec,
  TagValue,
  DataPoint,
  DataPointTag,
  InboundMessage,
  MatchResult,
  DispatchFailure,
  DispatchResult,
  RuleSummary,
} from './mapping/index.js';
export {
  coerce,
  coerceText,
  coerceNode,
  formatTypedValue,
  describeValueType,
  describeNode,
} from './codecs/coerce.js';
export { decodeTextPayload, decodeJsonPayload, MAX_JSON_DEPTH } from './codecs/payload.js';
export type { ValueType, TypedValue, JsonValue, JsonObject, ValueSource } from './codecs/types.js';
export { compileJsonPath, queryJsonPath } from './extraction/json-path.js';
export type { JsonPath, PathSegment, PathSelector } from './extraction/json-path.js';
export { extractValue, extractTimestamp } from './extraction/payload-extractor.js';
export { loadConfig, parseConfig } from './config/loader.js';
export type {
  AppConfig,
  MqttConfig,
  InfluxDbConfig,
  DatabaseConfig,
  MappingConfig,
  PayloadConfig,
  TagValueConfig,
  ApiConfig,
} from './config/loader.js';
export { MappingError, ConfigError, MessageError } from './errors.js';
export type { ConfigErrorKind, MessageErrorKind, DispatchStage } from './errors.js';
export { InfluxDbSink, toInfluxPoint, createPointWriter } from './store/index.js';
export type { DataPointSink, PointWriter } from './store/index.js';
export { MqttClientWrapper, createMqttClient, MessageHandler, createMessageHandler, attachHandler } from './mqtt/index.js';
export type { MessageStats, MessageHandlerDeps, ConnectionState } from './mqtt/index.js';
export { createServer, startServer } from './api/index.js';
export type { ApiContext } from './api/index.js';
export { logger } from './logger.js';
