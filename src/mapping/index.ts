export { compileTopicPattern, topicCaptures, matchesTopic, countSingleWildcards } from './topic.js';
export type { TopicLevel, TopicPattern } from './topic.js';

export { compileTemplate, renderTemplate, staticText } from './template.js';
export type { Template, TemplatePart } from './template.js';

export { compileRule } from './rule.js';
export type { CompiledRule, CompiledTag, PayloadSpec, TagValue } from './rule.js';

export { PointMapper } from './point-mapper.js';
export type { DataPoint, DataPointTag } from './point-mapper.js';

export { MappingEngine } from './engine.js';
export type {
  InboundMessage,
  MatchResult,
  DispatchFailure,
  DispatchResult,
  RuleSummary,
} from './engine.js';
