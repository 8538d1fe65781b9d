// Wire format constants.
//
// Every record starts with a control byte. Either it's one of the sentinel values below,
// or the top two bits select a mode and the low six bits carry a length:
//
//   00xxxxxx  literal      xxxxxx raw bytes follow
//   01xxxxxx  nibble       xxxxxx 4-bit values follow, packed two per byte (high first)
//   10xxxxxx  run          one value byte follows, repeated xxxxxx times
//   11xxxxxx  delta        start byte + biased delta byte; xxxxxx values
//
//   0xF0 zero run          one length byte
//   0xE0 pattern           (length << 4 | repeat), then `length` bytes
//   0xF2 common value      (run length << 4 | table index)
//   0xF1 reserved
//
// The sentinels all live in the delta range, so delta records must never use the lengths
// that would produce them (see isReservedDeltaLength).

export const kModeMask = 0xc0;
export const kFieldMask = 0x3f;

export const kModeLiteral = 0x00;
export const kModeNibble = 0x40;
export const kModeRun = 0x80;
export const kModeDelta = 0xc0;

export const kSentinelPattern = 0xe0;
export const kSentinelZeroRun = 0xf0;
export const kSentinelReserved = 0xf1;
export const kSentinelCommonValue = 0xf2;

const kSentinels: ReadonlySet<number> = new Set([
  kSentinelPattern,
  kSentinelZeroRun,
  kSentinelReserved,
  kSentinelCommonValue,
]);

// field widths
export const kMaxField = 0x3f; // 6-bit length fields
export const kMaxZeroRun = 0xff;
export const kMaxNibbleField = 0x0f; // 4-bit halves of pattern / common-value info bytes

// detector limits
export const kMinZeroRun = 3;
export const kMinDeltaLength = 3;
export const kMinNibbleCount = 4;
export const kMaxNibbleCount = 62;
export const kMinRunLength = 3;
export const kMinPatternLength = 2;
export const kMaxPatternLength = kMaxNibbleField;
export const kMinPatternRepeat = 2;
export const kMaxPatternRepeat = kMaxNibbleField;

// delta records store 7-bit values; the per-step delta is biased into an unsigned byte.
export const kDeltaValueMask = 0x7f;
export const kMaxDeltaStep = 15;
export const kDeltaBias = 16;

export function isSentinel(controlByte: number): boolean {
  return kSentinels.has(controlByte);
}

export function isReservedDeltaLength(length: number): boolean {
  return isSentinel(kModeDelta | length);
}

// longest usable delta record length not above `length`.
export function clampDeltaLength(length: number): number {
  let n = Math.min(length, kMaxField);
  while (n > 0 && isReservedDeltaLength(n)) {
    n -= 1;
  }
  return n;
}
