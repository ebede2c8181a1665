export type SerializationErrorCode =
  | 'UnregisteredTag'
  | 'CodecFailure'
  | 'DuplicateTagConflict'
  | 'DepthExceeded'
  | 'ReservedTag'
  | 'InvalidEnvelope';

export type CodecDirection = 'serialize' | 'deserialize';

export class SerializationError extends Error {
  readonly code: SerializationErrorCode;

  constructor(code: SerializationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Deserialization met a tag this context never registered. */
export class UnregisteredTagError extends SerializationError {
  readonly tag: string;

  constructor(tag: string) {
    super('UnregisteredTag', `No codec registered for tag "${tag}"`);
    this.tag = tag;
  }
}

/**
 * A registered serializer or deserializer threw. The original error is kept
 * as `cause`.
 */
export class CodecFailureError extends SerializationError {
  readonly tag: string;
  readonly typeName: string;
  readonly direction: CodecDirection;

  constructor(tag: string, typeName: string, direction: CodecDirection, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('CodecFailure', `Failed to ${direction} ${typeName} with codec "${tag}": ${reason}`, { cause });
    this.tag = tag;
    this.typeName = typeName;
    this.direction = direction;
  }
}

export class DuplicateTagError extends SerializationError {
  readonly tag: string;

  constructor(tag: string, boundType: string, requestedType: string) {
    super('DuplicateTagConflict', `Tag "${tag}" is already bound to ${boundType}, cannot bind it to ${requestedType}`);
    this.tag = tag;
  }
}

export class DepthExceededError extends SerializationError {
  readonly limit: number;

  constructor(limit: number) {
    super('DepthExceeded', `Representation nesting exceeded ${limit} levels (cyclic values are not supported)`);
    this.limit = limit;
  }
}

export class ReservedTagError extends SerializationError {
  constructor(tag: string) {
    super('ReservedTag', `Tag "${tag}" is reserved for the fallback codec`);
  }
}

export class InvalidEnvelopeError extends SerializationError {
  constructor(reason: string) {
    super('InvalidEnvelope', `Invalid serialized envelope: ${reason}`);
  }
}
