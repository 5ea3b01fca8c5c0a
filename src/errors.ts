export type ConfigErrorKind =
  | 'InvalidPatternLevel'
  | 'MisplacedMultiWildcard'
  | 'InvalidReferenceIndex'
  | 'ReferenceOutOfRange'
  | 'InvalidPathExpression'
  | 'InvalidTagValue'
  | 'InvalidConfig';

export type MessageErrorKind =
  | 'UnmatchedTopic'
  | 'MalformedPayload'
  | 'InvalidPayloadEncoding'
  | 'ValueNotFound'
  | 'TimestampNotFound'
  | 'TimestampNotNumeric'
  | 'InvalidBoolean'
  | 'InvalidNumber'
  | 'UnsupportedTextSource'
  | 'UnresolvedReference'
  | 'UnexpectedError';

/** The step of dispatch a message failed at. */
export type DispatchStage = 'match' | 'field-name' | 'payload' | 'value' | 'timestamp' | 'tags';

export class MappingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MappingError';
  }
}

/**
 * A rule that cannot be compiled. Raised while loading configuration and
 * fatal to startup.
 */
export class ConfigError extends MappingError {
  constructor(
    public readonly kind: ConfigErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * A single inbound message that cannot be turned into a data point. The
 * message is dropped; processing continues with the next one.
 */
export class MessageError extends MappingError {
  public readonly stage?: DispatchStage;

  constructor(
    public readonly kind: MessageErrorKind,
    message: string,
    options?: { cause?: unknown; stage?: DispatchStage }
  ) {
    super(message, options);
    this.name = 'MessageError';
    this.stage = options?.stage;
  }

  atStage(stage: DispatchStage): MessageError {
    return new MessageError(this.kind, this.message, { cause: this.cause, stage });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
