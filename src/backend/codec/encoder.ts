import { ByteWriter } from "./byteWriter";
import { CodecError } from "./errors";
import { kMaxField } from "./format";
import { CodecRecord, recordSpan, writeRecord } from "./records";
import { selectRecord } from "./strategy";
import { capture, Result } from "../../utils/errorHandling";

export interface EncodeOptions {
  // fail with CapacityExceeded rather than produce more than this many bytes
  maxOutputLength?: number;
}

// Splits the input into records, left to right.
export function planRecords(input: Uint8Array): CodecRecord[] {
  const records: CodecRecord[] = [];
  let pos = 0;
  let selected = input.length > 0 ? selectRecord(input, 0) : undefined;

  while (pos < input.length) {
    if (selected) {
      records.push(selected);
      pos += recordSpan(selected);
      selected = pos < input.length ? selectRecord(input, pos) : undefined;
      continue;
    }

    // literal: take bytes until another strategy can start, or the count field is full.
    const start = pos;
    pos += 1;
    while (pos < input.length && pos - start < kMaxField) {
      selected = selectRecord(input, pos);
      if (selected) {
        break;
      }
      pos += 1;
    }
    records.push({ kind: "literal", bytes: input.slice(start, pos) });
    if (pos - start === kMaxField && pos < input.length) {
      selected = selectRecord(input, pos);
    }
  }

  return records;
}

export function encode(input: Uint8Array, options: EncodeOptions = {}): Uint8Array {
  if (input.length === 0) {
    return new Uint8Array();
  }
  const out = new ByteWriter(options.maxOutputLength);
  for (const record of planRecords(input)) {
    writeRecord(out, record);
  }
  return out.toUint8Array();
}

// Encodes into a caller-owned buffer and returns the number of bytes written.
// The buffer is left untouched when the result does not fit.
export function encodeInto(input: Uint8Array, output: Uint8Array): number {
  const encoded = encode(input, { maxOutputLength: output.length });
  output.set(encoded);
  return encoded.length;
}

export function tryEncode(input: Uint8Array, options: EncodeOptions = {}): Result<Uint8Array, CodecError> {
  return capture(() => encode(input, options), CodecError);
}
