import { ByteWriter } from "./byteWriter";
import { commonValueAt, kCommonValues } from "./commonValues";
import { malformed, outOfRange } from "./errors";
import {
  isReservedDeltaLength,
  kDeltaBias,
  kDeltaValueMask,
  kFieldMask,
  kMaxDeltaStep,
  kMaxField,
  kMaxNibbleField,
  kMaxZeroRun,
  kModeDelta,
  kModeLiteral,
  kModeMask,
  kModeNibble,
  kModeRun,
  kSentinelCommonValue,
  kSentinelPattern,
  kSentinelReserved,
  kSentinelZeroRun,
} from "./format";

// One encoded unit. Each variant carries only the fields its wire form needs.
export type CodecRecord =
  | { kind: "zeroRun"; length: number }
  | { kind: "delta"; length: number; start: number; delta: number }
  | { kind: "nibble"; values: Uint8Array }
  | { kind: "pattern"; unit: Uint8Array; repeat: number }
  | { kind: "commonValue"; length: number; index: number }
  | { kind: "run"; length: number; value: number }
  | { kind: "literal"; bytes: Uint8Array };

export type CodecRecordKind = CodecRecord["kind"];

// number of original bytes the record stands for
export function recordSpan(record: CodecRecord): number {
  switch (record.kind) {
    case "zeroRun":
    case "delta":
    case "commonValue":
    case "run":
      return record.length;
    case "nibble":
      return record.values.length;
    case "pattern":
      return record.unit.length * record.repeat;
    case "literal":
      return record.bytes.length;
  }
}

// number of encoded bytes the record takes, control byte included
export function recordSize(record: CodecRecord): number {
  switch (record.kind) {
    case "zeroRun":
    case "commonValue":
    case "run":
      return 2;
    case "delta":
      return 3;
    case "nibble":
      return 1 + Math.ceil(record.values.length / 2);
    case "pattern":
      return 2 + record.unit.length;
    case "literal":
      return 1 + record.bytes.length;
  }
}

export function recordSaving(record: CodecRecord): number {
  return recordSpan(record) - recordSize(record);
}

/** ---- writing ---- */

function checkRange(name: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw outOfRange(`${name} ${value} is outside ${min}..${max}`);
  }
}

// Serializes one record. Field widths are checked here so an out-of-range value can
// never reach the stream.
export function writeRecord(out: ByteWriter, record: CodecRecord): void {
  switch (record.kind) {
    case "zeroRun":
      checkRange("zero run length", record.length, 0, kMaxZeroRun);
      out.writeBytes([kSentinelZeroRun, record.length]);
      return;

    case "delta":
      checkRange("delta length", record.length, 0, kMaxField);
      if (isReservedDeltaLength(record.length)) {
        throw outOfRange(`delta length ${record.length} collides with a sentinel byte`);
      }
      checkRange("delta start", record.start, 0, kDeltaValueMask);
      checkRange("delta step", record.delta, -kMaxDeltaStep, kMaxDeltaStep);
      out.writeBytes([kModeDelta | record.length, record.start, record.delta + kDeltaBias]);
      return;

    case "nibble": {
      const values = record.values;
      checkRange("nibble count", values.length, 0, kMaxField);
      for (const v of values) {
        checkRange("nibble value", v, 0, 0x0f);
      }
      out.writeByte(kModeNibble | values.length);
      const pairs = Math.floor(values.length / 2);
      for (let i = 0; i < pairs; i += 1) {
        out.writeByte((values[i * 2] << 4) | values[i * 2 + 1]);
      }
      if (values.length % 2 === 1) {
        out.writeByte(values[values.length - 1] << 4);
      }
      return;
    }

    case "pattern":
      checkRange("pattern length", record.unit.length, 0, kMaxNibbleField);
      checkRange("pattern repeat", record.repeat, 0, kMaxNibbleField);
      out.writeBytes([kSentinelPattern, (record.unit.length << 4) | record.repeat]);
      out.writeBytes(record.unit);
      return;

    case "commonValue":
      checkRange("common value run length", record.length, 0, kMaxNibbleField);
      checkRange("common value index", record.index, 0, kCommonValues.length - 1);
      out.writeBytes([kSentinelCommonValue, (record.length << 4) | record.index]);
      return;

    case "run":
      checkRange("run length", record.length, 0, kMaxField);
      checkRange("run value", record.value, 0, 0xff);
      out.writeBytes([kModeRun | record.length, record.value]);
      return;

    case "literal":
      checkRange("literal count", record.bytes.length, 0, kMaxField);
      out.writeByte(kModeLiteral | record.bytes.length);
      out.writeBytes(record.bytes);
      return;
  }
}

/** ---- reading ---- */

export interface ParsedRecord {
  record: CodecRecord;
  offset: number; // position of the control byte
  next: number; // position just past the record
}

// Parses the record at `offset`. Throws MalformedStream if the record is cut short or
// uses a value the format does not allow.
export function readRecord(encoded: Uint8Array, offset: number): ParsedRecord {
  const take = (count: number): Uint8Array => {
    const from = offset + 1;
    if (from + count > encoded.length) {
      throw malformed(`truncated record: needs ${count} payload bytes, ${encoded.length - from} left`, offset);
    }
    return encoded.subarray(from, from + count);
  };

  const control = encoded[offset];
  const done = (record: CodecRecord, payloadSize: number): ParsedRecord => ({
    record,
    offset,
    next: offset + 1 + payloadSize,
  });

  switch (control) {
    case kSentinelZeroRun:
      return done({ kind: "zeroRun", length: take(1)[0] }, 1);

    case kSentinelPattern: {
      const info = take(1)[0];
      const unitLength = info >> 4;
      const repeat = info & 0x0f;
      const unit = take(1 + unitLength).slice(1);
      return done({ kind: "pattern", unit, repeat }, 1 + unitLength);
    }

    case kSentinelCommonValue: {
      const info = take(1)[0];
      const index = info & 0x0f;
      if (commonValueAt(index) === undefined) {
        throw malformed(`common value index ${index} is not in the table`, offset);
      }
      return done({ kind: "commonValue", length: info >> 4, index }, 1);
    }

    case kSentinelReserved:
      throw malformed(`reserved control byte 0x${control.toString(16)}`, offset);
  }

  const length = control & kFieldMask;
  switch (control & kModeMask) {
    case kModeRun:
      return done({ kind: "run", length, value: take(1)[0] }, 1);

    case kModeDelta: {
      const [start, biased] = take(2);
      const delta = biased - kDeltaBias;
      if (Math.abs(delta) > kMaxDeltaStep) {
        throw malformed(`biased delta ${biased} is outside ${kDeltaBias - kMaxDeltaStep}..${kDeltaBias + kMaxDeltaStep}`, offset);
      }
      return done({ kind: "delta", length, start, delta }, 2);
    }

    case kModeNibble: {
      const packedSize = Math.ceil(length / 2);
      const packed = take(packedSize);
      const values = new Uint8Array(length);
      for (let i = 0; i < length; i += 1) {
        const b = packed[i >> 1];
        values[i] = i % 2 === 0 ? b >> 4 : b & 0x0f;
      }
      return done({ kind: "nibble", values }, packedSize);
    }

    default:
      return done({ kind: "literal", bytes: take(length).slice() }, length);
  }
}

/** ---- expanding ---- */

export function expandRecord(out: ByteWriter, record: CodecRecord): void {
  switch (record.kind) {
    case "zeroRun":
      out.fill(0x00, record.length);
      return;
    case "delta": {
      const values = new Array<number>(record.length);
      for (let i = 0; i < record.length; i += 1) {
        values[i] = (record.start + i * record.delta) & kDeltaValueMask;
      }
      out.writeBytes(values);
      return;
    }
    case "nibble":
      out.writeBytes(record.values);
      return;
    case "pattern":
      for (let i = 0; i < record.repeat; i += 1) {
        out.writeBytes(record.unit);
      }
      return;
    case "commonValue":
      out.fill(kCommonValues[record.index], record.length);
      return;
    case "run":
      out.fill(record.value, record.length);
      return;
    case "literal":
      out.writeBytes(record.bytes);
      return;
  }
}
