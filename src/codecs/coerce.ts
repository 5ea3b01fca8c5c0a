import { MessageError } from '../errors.js';
import { JsonValue, TypedValue, ValueSource, ValueType } from './types.js';

const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;
const U64_MAX = 2n ** 64n - 1n;

const FLOAT_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const FLOAT_SPECIAL_RE = /^([+-]?)(inf|infinity|nan)$/i;
const SIGNED_RE = /^[+-]?\d+$/;
const UNSIGNED_RE = /^\+?\d+$/;

export function describeValueType(type: ValueType): string {
  return type.replace('-', ' ');
}

function invalidNumber(type: ValueType, shown: string): MessageError {
  return new MessageError('InvalidNumber', `Value '${shown}' is not a valid ${describeValueType(type)}`);
}

function parseFloatText(raw: string): number | undefined {
  if (FLOAT_RE.test(raw)) return Number(raw);
  const special = FLOAT_SPECIAL_RE.exec(raw);
  if (!special) return undefined;
  if (special[2].toLowerCase() === 'nan') return NaN;
  return special[1] === '-' ? -Infinity : Infinity;
}

function parseIntegerText(raw: string, re: RegExp, min: bigint, max: bigint): bigint | undefined {
  if (!re.test(raw)) return undefined;
  const value = BigInt(raw.startsWith('+') ? raw.slice(1) : raw);
  return value >= min && value <= max ? value : undefined;
}

/** Converts the text form of a value, as carried by a raw payload or a tag literal. */
export function coerceText(raw: string, type: ValueType): TypedValue {
  switch (type) {
    case 'boolean':
      if (raw === 'true') return { type, value: true };
      if (raw === 'false') return { type, value: false };
      throw new MessageError('InvalidBoolean', `Value '${raw}' is not a valid boolean`);
    case 'float': {
      const value = parseFloatText(raw);
      if (value === undefined) throw invalidNumber(type, raw);
      return { type, value };
    }
    case 'signed-integer': {
      const value = parseIntegerText(raw, SIGNED_RE, I64_MIN, I64_MAX);
      if (value === undefined) throw invalidNumber(type, raw);
      return { type, value };
    }
    case 'unsigned-integer': {
      const value = parseIntegerText(raw, UNSIGNED_RE, 0n, U64_MAX);
      if (value === undefined) throw invalidNumber(type, raw);
      return { type, value };
    }
    case 'text':
      return { type, value: raw };
  }
}

/** Short form of a node for error messages. */
export function describeNode(node: JsonValue): string {
  if (node instanceof Map) return 'an object';
  if (Array.isArray(node)) return 'an array';
  if (typeof node === 'string') return JSON.stringify(node);
  return String(node);
}

function integerNode(node: JsonValue, min: bigint, max: bigint): bigint | undefined {
  let value: bigint;
  if (typeof node === 'bigint') value = node;
  else if (typeof node === 'number' && Number.isSafeInteger(node)) value = BigInt(node);
  else return undefined;
  return value >= min && value <= max ? value : undefined;
}

/** Converts a node of a decoded JSON payload without losing precision. */
export function coerceNode(node: JsonValue, type: ValueType): TypedValue {
  switch (type) {
    case 'boolean':
      if (typeof node === 'boolean') return { type, value: node };
      throw new MessageError('InvalidBoolean', `Need a boolean but got ${describeNode(node)}`);
    case 'float':
      if (typeof node === 'number') return { type, value: node };
      if (typeof node === 'bigint') return { type, value: Number(node) };
      throw invalidNumber(type, describeNode(node));
    case 'signed-integer': {
      const value = integerNode(node, I64_MIN, I64_MAX);
      if (value === undefined) throw invalidNumber(type, describeNode(node));
      return { type, value };
    }
    case 'unsigned-integer': {
      const value = integerNode(node, 0n, U64_MAX);
      if (value === undefined) throw invalidNumber(type, describeNode(node));
      return { type, value };
    }
    case 'text':
      if (typeof node === 'string') return { type, value: node };
      if (typeof node === 'boolean' || typeof node === 'number' || typeof node === 'bigint') {
        return { type, value: String(node) };
      }
      throw new MessageError(
        'UnsupportedTextSource',
        `Cannot use ${describeNode(node)} as text; need a string, number or boolean`
      );
  }
}

export function coerce(source: ValueSource, type: ValueType): TypedValue {
  return source.kind === 'text' ? coerceText(source.text, type) : coerceNode(source.node, type);
}

export function formatTypedValue(value: TypedValue): string {
  return value.type === 'text' ? value.value : String(value.value);
}
