import { MappingConfig } from '../config/loader.js';
import { DispatchStage, MessageError, MessageErrorKind, errorMessage } from '../errors.js';
import { DataPoint, PointMapper } from './point-mapper.js';
import { CompiledRule, compileRule } from './rule.js';
import { topicCaptures } from './topic.js';

export interface InboundMessage {
  topic: string;
  payload: Buffer;
}

export interface MatchResult {
  rule: CompiledRule;
  captures: string[];
}

export interface DispatchFailure {
  topic: string;
  ruleIndex?: number;
  stage: DispatchStage;
  kind: MessageErrorKind;
  message: string;
}

export type DispatchResult =
  | { ok: true; ruleIndex: number; point: DataPoint }
  | { ok: false; error: DispatchFailure };

export interface RuleSummary {
  index: number;
  topic: string;
  fieldName: string;
  valueType: string;
  payload: 'raw' | 'json';
  tags: string[];
}

/**
 * Holds the compiled rules in configuration order. The rule list is frozen
 * at construction, so one engine can serve any number of concurrent
 * dispatches.
 */
export class MappingEngine {
  private readonly rules: readonly CompiledRule[];
  private readonly mapper: PointMapper;

  constructor(rules: readonly CompiledRule[], options: { now?: () => number } = {}) {
    this.rules = Object.freeze([...rules]);
    this.mapper = new PointMapper(options.now);
  }

  /** Compiles every mapping; the first invalid one throws a ConfigError. */
  static fromConfig(mappings: MappingConfig[], options: { now?: () => number } = {}): MappingEngine {
    return new MappingEngine(
      mappings.map((mapping, index) => compileRule(mapping, index)),
      options
    );
  }

  match(topic: string): MatchResult | null {
    for (const rule of this.rules) {
      const captures = topicCaptures(rule.topic, topic);
      if (captures) {
        return { rule, captures };
      }
    }
    return null;
  }

  findRule(topic: string): CompiledRule | null {
    return this.match(topic)?.rule ?? null;
  }

  dispatch(message: InboundMessage): DispatchResult {
    const matched = this.match(message.topic);
    if (!matched) {
      return {
        ok: false,
        error: {
          topic: message.topic,
          stage: 'match',
          kind: 'UnmatchedTopic',
          message: `Topic ${message.topic} not found in mappings`,
        },
      };
    }

    const { rule, captures } = matched;
    try {
      const point = this.mapper.map(rule, captures, message.payload);
      return { ok: true, ruleIndex: rule.index, point };
    } catch (caught) {
      const err =
        caught instanceof MessageError
          ? caught
          : new MessageError('UnexpectedError', errorMessage(caught), { cause: caught });
      return {
        ok: false,
        error: {
          topic: message.topic,
          ruleIndex: rule.index,
          stage: err.stage ?? 'value',
          kind: err.kind,
          message: err.message,
        },
      };
    }
  }

  listRules(): readonly CompiledRule[] {
    return this.rules;
  }

  describeRules(): RuleSummary[] {
    return this.rules.map((rule) => ({
      index: rule.index,
      topic: rule.topic.original,
      fieldName: rule.fieldName.original,
      valueType: rule.valueType,
      payload: rule.payload.kind,
      tags: rule.tags.map((tag) => tag.name),
    }));
  }

  /** Distinct subscription filters, in rule order. */
  getTopicPatterns(): string[] {
    return Array.from(new Set(this.rules.map((rule) => rule.topic.original)));
  }
}
