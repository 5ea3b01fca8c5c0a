import { describeNode } from '../codecs/coerce.js';
import { JsonValue } from '../codecs/types.js';
import { MessageError } from '../errors.js';
import { JsonPath, queryJsonPath } from './json-path.js';

function firstMatch(document: JsonValue, path: JsonPath): JsonValue | undefined {
  const [first] = queryJsonPath(path, document);
  return first;
}

export function extractValue(document: JsonValue, path: JsonPath): JsonValue {
  const node = firstMatch(document, path);
  if (node === undefined) {
    throw new MessageError('ValueNotFound', `Couldn't find value at '${path.original}' in payload`);
  }
  return node;
}

/**
 * Reads a millisecond timestamp. A path that matches nothing fails the
 * message rather than falling back to the receive time.
 */
export function extractTimestamp(document: JsonValue, path: JsonPath): number {
  const node = firstMatch(document, path);
  if (node === undefined) {
    throw new MessageError('TimestampNotFound', `Couldn't find timestamp at '${path.original}' in payload`);
  }
  const millis = typeof node === 'bigint' && node <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(node) : node;
  if (typeof millis !== 'number' || !Number.isSafeInteger(millis) || millis < 0) {
    throw new MessageError('TimestampNotNumeric', `${describeNode(node)} cannot be converted to a timestamp`);
  }
  return millis;
}
