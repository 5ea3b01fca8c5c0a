export type ValueType = 'boolean' | 'float' | 'signed-integer' | 'unsigned-integer' | 'text';

export const VALUE_TYPES = ['boolean', 'float', 'signed-integer', 'unsigned-integer', 'text'] as const;

export type TypedValue =
  | { type: 'boolean'; value: boolean }
  | { type: 'float'; value: number }
  | { type: 'signed-integer'; value: bigint }
  | { type: 'unsigned-integer'; value: bigint }
  | { type: 'text'; value: string };

/**
 * A decoded JSON node. Integers keep every digit as `bigint`, other numbers
 * are `number`, and objects keep their members in payload order.
 */
export type JsonValue = null | boolean | number | bigint | string | JsonValue[] | JsonObject;

export type JsonObject = Map<string, JsonValue>;

/** Where a value comes from: the whole payload as text, or a node of a JSON payload. */
export type ValueSource =
  | { kind: 'text'; text: string }
  | { kind: 'node'; node: JsonValue };
