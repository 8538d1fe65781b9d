export type CodecErrorKind = "CapacityExceeded" | "MalformedStream" | "ValueOutOfRange";

// Raised by encode/decode. offset is the input position (encode) or the record's
// control byte position (decode) where the problem was found.
export class CodecError extends Error {
  constructor(
    public readonly kind: CodecErrorKind,
    message: string,
    public readonly offset?: number,
  ) {
    super(offset === undefined ? message : `${message} (at byte ${offset})`);
    this.name = "CodecError";
  }
}

export function malformed(message: string, offset: number): CodecError {
  return new CodecError("MalformedStream", message, offset);
}

export function outOfRange(message: string): CodecError {
  return new CodecError("ValueOutOfRange", message);
}
