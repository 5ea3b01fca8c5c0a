import { ConfigError, MessageError } from '../errors.js';

export type TemplatePart =
  | { kind: 'literal'; text: string }
  | { kind: 'reference'; index: number };

export interface Template {
  readonly parts: readonly TemplatePart[];
  readonly maxReference: number;
  readonly original: string;
}

/** An MQTT topic is at most 65535 bytes, so it can never yield more captures. */
const MAX_REFERENCE = 65535;

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

/**
 * Compiles a name template such as `temp_$1`. `$N` refers to the Nth `+`
 * capture of the matched topic (1-based). A backslash directly before `$`
 * escapes it and is dropped; any other backslash is kept as-is.
 */
export function compileTemplate(raw: string): Template {
  const parts: TemplatePart[] = [];
  let literal = '';
  let maxReference = 0;
  let i = 0;

  while (i < raw.length) {
    const ch = raw[i];

    if (ch === '\\' && raw[i + 1] === '$') {
      literal += '$';
      i += 2;
      continue;
    }

    if (ch === '$' && isDigit(raw[i + 1])) {
      let end = i + 1;
      while (isDigit(raw[end])) end++;
      const digits = raw.slice(i + 1, end);
      const index = Number(digits);
      if (index === 0) {
        throw new ConfigError(
          'InvalidReferenceIndex',
          `Invalid reference number ${digits} in '${raw}'; references start at $1`
        );
      }
      if (index > MAX_REFERENCE) {
        throw new ConfigError(
          'InvalidReferenceIndex',
          `Invalid reference number ${digits} in '${raw}'; the largest is $${MAX_REFERENCE}`
        );
      }
      if (literal) {
        parts.push({ kind: 'literal', text: literal });
        literal = '';
      }
      parts.push({ kind: 'reference', index });
      maxReference = Math.max(maxReference, index);
      i = end;
      continue;
    }

    literal += ch;
    i++;
  }

  if (literal) {
    parts.push({ kind: 'literal', text: literal });
  }

  return Object.freeze({ parts: Object.freeze(parts), maxReference, original: raw });
}

export function renderTemplate(template: Template, captures: readonly string[]): string {
  let out = '';
  for (const part of template.parts) {
    if (part.kind === 'literal') {
      out += part.text;
      continue;
    }
    const value = captures[part.index - 1];
    if (value === undefined) {
      throw new MessageError(
        'UnresolvedReference',
        `Can't find reference $${part.index} to render '${template.original}' (${captures.length} captured)`
      );
    }
    out += value;
  }
  return out;
}

/** The template's text when it contains no references, otherwise undefined. */
export function staticText(template: Template): string | undefined {
  if (template.maxReference > 0) return undefined;
  return template.parts.map((part) => (part.kind === 'literal' ? part.text : '')).join('');
}
