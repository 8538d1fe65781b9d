import { ByteWriter } from "./byteWriter";
import { CodecError } from "./errors";
import { CodecRecord, expandRecord, ParsedRecord, readRecord } from "./records";
import { capture, Result } from "../../utils/errorHandling";
import { encodeHexString } from "../../utils/encoding/hex";

export interface DecodeOptions {
  // fail with CapacityExceeded rather than produce more than this many bytes
  maxOutputLength?: number;
}

// Walks the stream record by record without expanding anything.
export function inspect(encoded: Uint8Array): ParsedRecord[] {
  const parsed: ParsedRecord[] = [];
  let offset = 0;
  while (offset < encoded.length) {
    const entry = readRecord(encoded, offset);
    parsed.push(entry);
    offset = entry.next;
  }
  return parsed;
}

export function decode(encoded: Uint8Array, options: DecodeOptions = {}): Uint8Array {
  if (encoded.length === 0) {
    return new Uint8Array();
  }
  const out = new ByteWriter(options.maxOutputLength);
  let offset = 0;
  while (offset < encoded.length) {
    const { record, next } = readRecord(encoded, offset);
    expandRecord(out, record);
    offset = next;
  }
  return out.toUint8Array();
}

// Decodes into a caller-owned buffer and returns the number of bytes written.
// The buffer is left untouched when decoding fails.
export function decodeInto(encoded: Uint8Array, output: Uint8Array): number {
  const decoded = decode(encoded, { maxOutputLength: output.length });
  output.set(decoded);
  return decoded.length;
}

export function tryDecode(encoded: Uint8Array, options: DecodeOptions = {}): Result<Uint8Array, CodecError> {
  return capture(() => decode(encoded, options), CodecError);
}

export function describeRecord(record: CodecRecord): string {
  switch (record.kind) {
    case "zeroRun":
      return `zero run x${record.length}`;
    case "delta":
      return `delta start=${record.start} step=${record.delta} x${record.length}`;
    case "nibble":
      return `nibble [${Array.from(record.values).join(",")}]`;
    case "pattern":
      return `pattern [${encodeHexString(record.unit)}] x${record.repeat}`;
    case "commonValue":
      return `common value #${record.index} x${record.length}`;
    case "run":
      return `run 0x${record.value.toString(16).padStart(2, "0")} x${record.length}`;
    case "literal":
      return `literal [${encodeHexString(record.bytes)}]`;
  }
}
