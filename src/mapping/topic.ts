import { ConfigError } from '../errors.js';

export type TopicLevel =
  | { kind: 'literal'; value: string }
  | { kind: 'single-wildcard' }
  | { kind: 'multi-wildcard' };

export interface TopicPattern {
  readonly levels: readonly TopicLevel[];
  readonly original: string;
}

function compileLevel(level: string, pattern: string): TopicLevel {
  if (level === '+') return { kind: 'single-wildcard' };
  if (level === '#') return { kind: 'multi-wildcard' };
  if (level.includes('+') || level.includes('#')) {
    throw new ConfigError(
      'InvalidPatternLevel',
      `Topic level '${level}' in '${pattern}' cannot contain '+' or '#'`
    );
  }
  return { kind: 'literal', value: level };
}

/**
 * Compiles an MQTT subscription pattern. Empty levels are kept, so
 * `/foo/bar` starts with a level that only matches the empty string.
 */
export function compileTopicPattern(pattern: string): TopicPattern {
  const levels = pattern.split('/').map((level) => compileLevel(level, pattern));

  const multiIndex = levels.findIndex((level) => level.kind === 'multi-wildcard');
  if (multiIndex !== -1 && multiIndex < levels.length - 1) {
    throw new ConfigError(
      'MisplacedMultiWildcard',
      `Topic '${pattern}' has '#' wildcard before last topic level`
    );
  }

  return Object.freeze({ levels: Object.freeze(levels), original: pattern });
}

/**
 * Walks pattern and topic levels in lockstep. Returns the levels consumed by
 * `+` wildcards, or null when the topic does not match.
 */
export function topicCaptures(pattern: TopicPattern, topic: string): string[] | null {
  const topicLevels = topic.split('/');
  const captures: string[] = [];
  let i = 0;

  for (const level of pattern.levels) {
    if (level.kind === 'multi-wildcard') {
      return captures;
    }
    if (i >= topicLevels.length) {
      return null;
    }
    const current = topicLevels[i];
    if (level.kind === 'single-wildcard') {
      captures.push(current);
    } else if (level.value !== current) {
      return null;
    }
    i++;
  }

  return i === topicLevels.length ? captures : null;
}

export function matchesTopic(pattern: TopicPattern, topic: string): boolean {
  return topicCaptures(pattern, topic) !== null;
}

export function countSingleWildcards(pattern: TopicPattern): number {
  return pattern.levels.filter((level) => level.kind === 'single-wildcard').length;
}
