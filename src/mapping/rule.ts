import { MappingConfig, PayloadConfig, TagValueConfig } from '../config/loader.js';
import { coerceText } from '../codecs/coerce.js';
import { TypedValue, ValueType } from '../codecs/types.js';
import { ConfigError, MessageError } from '../errors.js';
import { JsonPath, compileJsonPath } from '../extraction/json-path.js';
import { Template, compileTemplate, staticText } from './template.js';
import { TopicPattern, compileTopicPattern, countSingleWildcards } from './topic.js';

export type PayloadSpec =
  | { kind: 'raw' }
  | { kind: 'json'; valuePath: JsonPath; timestampPath?: JsonPath };

export type TagValue =
  | { kind: 'literal'; value: TypedValue }
  | { kind: 'template'; template: Template };

export interface CompiledTag {
  readonly name: string;
  readonly value: TagValue;
}

export interface CompiledRule {
  readonly index: number;
  readonly topic: TopicPattern;
  readonly payload: PayloadSpec;
  readonly fieldName: Template;
  readonly valueType: ValueType;
  readonly tags: readonly CompiledTag[];
}

function compilePayload(payload: PayloadConfig | undefined): PayloadSpec {
  if (!payload) return { kind: 'raw' };
  return {
    kind: 'json',
    valuePath: compileJsonPath(payload.valueFieldPath),
    timestampPath: payload.timestampFieldPath ? compileJsonPath(payload.timestampFieldPath) : undefined,
  };
}

function compileTagValue(name: string, tag: TagValueConfig): TagValue {
  if (tag.type === 'text') {
    const template = compileTemplate(tag.value);
    const text = staticText(template);
    return text === undefined
      ? { kind: 'template', template }
      : { kind: 'literal', value: { type: 'text', value: text } };
  }
  try {
    return { kind: 'literal', value: coerceText(tag.value, tag.type) };
  } catch (err) {
    if (err instanceof MessageError) {
      throw new ConfigError('InvalidTagValue', `Tag '${name}': ${err.message}`, { cause: err });
    }
    throw err;
  }
}

function checkReferences(template: Template, available: number, what: string): void {
  if (template.maxReference > available) {
    throw new ConfigError(
      'ReferenceOutOfRange',
      `${what} '${template.original}' refers to $${template.maxReference} but the topic has ${available} '+' wildcard(s)`
    );
  }
}

function buildRule(config: MappingConfig, index: number): CompiledRule {
  const topic = compileTopicPattern(config.topic);
  const wildcards = countSingleWildcards(topic);

  const fieldName = compileTemplate(config.fieldName);
  checkReferences(fieldName, wildcards, 'Field name');

  const tags = Object.entries(config.tags).map(([name, tag]): CompiledTag => {
    const value = compileTagValue(name, tag);
    if (value.kind === 'template') {
      checkReferences(value.template, wildcards, `Tag '${name}' value`);
    }
    return Object.freeze({ name, value });
  });

  return Object.freeze({
    index,
    topic,
    payload: compilePayload(config.payload),
    fieldName,
    valueType: config.valueType,
    tags: Object.freeze(tags),
  });
}

/**
 * Compiles one configured mapping. Every problem is reported as a
 * ConfigError naming the mapping, since a bad rule must stop startup.
 */
export function compileRule(config: MappingConfig, index: number): CompiledRule {
  try {
    return buildRule(config, index);
  } catch (err) {
    if (err instanceof ConfigError) {
      throw new ConfigError(err.kind, `Mapping ${index} (topic '${config.topic}'): ${err.message}`, {
        cause: err,
      });
    }
    throw err;
  }
}
