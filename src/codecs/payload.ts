import { isUtf8 } from 'buffer';
import { isMap, isScalar, isSeq, parseDocument } from 'yaml';
import { MessageError, errorMessage } from '../errors.js';
import { JsonObject, JsonValue } from './types.js';

/** Payloads nested deeper than this are rejected as malformed. */
export const MAX_JSON_DEPTH = 128;

export function decodeTextPayload(payload: Buffer): string {
  if (!isUtf8(payload)) {
    throw new MessageError('InvalidPayloadEncoding', 'Invalid payload value: not valid UTF-8');
  }
  return payload.toString('utf8');
}

/** Deepest array/object nesting of a syntactically valid JSON text. */
function nestingDepth(text: string): number {
  let depth = 0;
  let max = 0;
  let inString = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === '\\') i++;
      else if (ch === '"') inString = false;
    } else if (ch === '"') {
      inString = true;
    } else if (ch === '[' || ch === '{') {
      max = Math.max(max, ++depth);
    } else if (ch === ']' || ch === '}') {
      depth--;
    }
  }
  return max;
}

function scalarValue(value: unknown): JsonValue {
  if (
    value === null ||
    typeof value === 'boolean' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'string'
  ) {
    return value;
  }
  throw new Error(`unexpected scalar ${String(value)}`);
}

function toJsonValue(node: unknown): JsonValue {
  if (isScalar(node)) {
    return scalarValue(node.value);
  }
  if (isSeq(node)) {
    return node.items.map((item) => toJsonValue(item));
  }
  if (isMap(node)) {
    const members: JsonObject = new Map();
    for (const pair of node.items) {
      const key = isScalar(pair.key) ? pair.key.value : pair.key;
      if (typeof key !== 'string') {
        throw new Error('object keys must be strings');
      }
      members.set(key, toJsonValue(pair.value));
    }
    return members;
  }
  throw new Error('unexpected node');
}

/**
 * Parses a JSON payload. `JSON.parse` checks the syntax; the document is then
 * read through yaml's JSON schema, which keeps member order and gives
 * integers as `bigint`.
 */
export function decodeJsonPayload(payload: Buffer): JsonValue {
  if (!isUtf8(payload)) {
    throw new MessageError('MalformedPayload', 'Failed to parse payload as JSON: not valid UTF-8');
  }
  const text = payload.toString('utf8');

  try {
    JSON.parse(text);
    if (nestingDepth(text) > MAX_JSON_DEPTH) {
      throw new Error(`nested deeper than ${MAX_JSON_DEPTH} levels`);
    }

    const doc = parseDocument(text, { schema: 'json', intAsBigInt: true, uniqueKeys: false });
    if (doc.errors.length > 0) {
      throw doc.errors[0];
    }
    return toJsonValue(doc.contents);
  } catch (err) {
    throw new MessageError('MalformedPayload', `Failed to parse payload as JSON: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}
