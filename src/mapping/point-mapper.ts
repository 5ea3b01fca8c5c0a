import { coerce } from '../codecs/coerce.js';
import { decodeJsonPayload, decodeTextPayload } from '../codecs/payload.js';
import { TypedValue, ValueSource } from '../codecs/types.js';
import { DispatchStage, MessageError, errorMessage } from '../errors.js';
import { extractTimestamp, extractValue } from '../extraction/payload-extractor.js';
import { CompiledRule, CompiledTag } from './rule.js';
import { renderTemplate } from './template.js';

export interface DataPointTag {
  name: string;
  value: TypedValue;
}

export interface DataPoint {
  /** Milliseconds since the epoch. */
  timestamp: number;
  fieldName: string;
  value: TypedValue;
  tags: DataPointTag[];
}

function atStage<T>(stage: DispatchStage, step: () => T): T {
  try {
    return step();
  } catch (err) {
    if (err instanceof MessageError) throw err.atStage(stage);
    throw new MessageError('UnexpectedError', errorMessage(err), { cause: err, stage });
  }
}

function renderTag(tag: CompiledTag, captures: readonly string[]): DataPointTag {
  if (tag.value.kind === 'literal') {
    return { name: tag.name, value: tag.value.value };
  }
  return {
    name: tag.name,
    value: { type: 'text', value: renderTemplate(tag.value.template, captures) },
  };
}

export class PointMapper {
  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Builds the data point for a message whose topic matched `rule`.
   * Throws a MessageError tagged with the failing stage.
   */
  map(rule: CompiledRule, captures: readonly string[], payload: Buffer): DataPoint {
    const fieldName = atStage('field-name', () => renderTemplate(rule.fieldName, captures));

    let source: ValueSource;
    let timestamp: number | undefined;

    if (rule.payload.kind === 'raw') {
      const text = atStage('payload', () => decodeTextPayload(payload));
      source = { kind: 'text', text };
    } else {
      const { valuePath, timestampPath } = rule.payload;
      const document = atStage('payload', () => decodeJsonPayload(payload));
      source = { kind: 'node', node: atStage('value', () => extractValue(document, valuePath)) };
      if (timestampPath) {
        timestamp = atStage('timestamp', () => extractTimestamp(document, timestampPath));
      }
    }

    const value = atStage('value', () => coerce(source, rule.valueType));
    const tags = atStage('tags', () => rule.tags.map((tag) => renderTag(tag, captures)));

    return {
      timestamp: timestamp ?? atStage('timestamp', () => this.now()),
      fieldName,
      value,
      tags,
    };
  }
}
