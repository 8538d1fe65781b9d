// Pattern detectors. Each one looks at `data` starting at `pos` and reports how much of it
// a single record of its kind could cover. The count*/measure* functions report the raw
// extent; the detect* functions return undefined unless the strategy applies.

import {
  kDeltaValueMask,
  kMaxDeltaStep,
  kMaxField,
  kMaxNibbleCount,
  kMaxPatternLength,
  kMaxPatternRepeat,
  kMaxZeroRun,
  kMinDeltaLength,
  kMinNibbleCount,
  kMinPatternLength,
  kMinPatternRepeat,
  kMinRunLength,
  kMinZeroRun,
} from "./format";

export interface DeltaSequence {
  length: number;
  delta: number;
}

export interface PatternMatch {
  unit: Uint8Array;
  repeat: number;
}

/** ---- zero runs ---- */

export function countZeroRun(data: Uint8Array, pos: number): number {
  let n = 0;
  while (pos + n < data.length && data[pos + n] === 0x00 && n < kMaxZeroRun) {
    n += 1;
  }
  return n;
}

export function detectZeroRun(data: Uint8Array, pos: number): number | undefined {
  const n = countZeroRun(data, pos);
  return n >= kMinZeroRun ? n : undefined;
}

/** ---- delta sequences ---- */

// Sequences are 7-bit: both seed bytes must be < 0x80, and each following byte has to be
// (prev + delta) mod 128, which keeps the whole span below 0x80.
export function measureDeltaSequence(data: Uint8Array, pos: number): DeltaSequence | undefined {
  if (pos + 2 > data.length) {
    return undefined;
  }
  const first = data[pos];
  const second = data[pos + 1];
  if (first > kDeltaValueMask || second > kDeltaValueMask) {
    return undefined;
  }

  const delta = second - first;
  let length = 2;
  for (let i = pos + 2; i < data.length && length < kMaxField; i += 1) {
    if (data[i] !== ((data[i - 1] + delta) & kDeltaValueMask)) {
      break;
    }
    length += 1;
  }
  return { length, delta };
}

export function detectDeltaSequence(data: Uint8Array, pos: number): DeltaSequence | undefined {
  const seq = measureDeltaSequence(data, pos);
  if (!seq || seq.length < kMinDeltaLength || Math.abs(seq.delta) > kMaxDeltaStep) {
    return undefined;
  }
  return seq;
}

/** ---- nibble-packable values ---- */

export function countNibbles(data: Uint8Array, pos: number): number {
  let n = 0;
  while (pos + n < data.length && data[pos + n] < 0x10 && n < kMaxNibbleCount) {
    n += 1;
  }
  return n;
}

export function detectNibbleRun(data: Uint8Array, pos: number): number | undefined {
  const n = countNibbles(data, pos);
  return n >= kMinNibbleCount ? n : undefined;
}

/** ---- repeating units ---- */

function unitRepeats(data: Uint8Array, pos: number, unitLength: number): boolean {
  for (let k = 0; k < unitLength; k += 1) {
    if (data[pos + k] !== data[pos - unitLength + k]) {
      return false;
    }
  }
  return true;
}

// bytes saved by a pattern record over storing the span raw
export function patternSaving(unitLength: number, repeat: number): number {
  return repeat * unitLength - (2 + unitLength);
}

// Best repeating unit at pos, by bytes saved. Ties keep the shorter unit.
export function findPattern(data: Uint8Array, pos: number): PatternMatch | undefined {
  let bestLength = 0;
  let bestRepeat = 0;
  let bestSaving = -Infinity;

  for (let len = kMinPatternLength; len <= kMaxPatternLength && pos + len * 2 <= data.length; len += 1) {
    let repeat = 1;
    for (let i = pos + len; i + len <= data.length && repeat < kMaxPatternRepeat; i += len) {
      if (!unitRepeats(data, i, len)) {
        break;
      }
      repeat += 1;
    }

    if (repeat < kMinPatternRepeat) {
      continue;
    }
    const saving = patternSaving(len, repeat);
    if (saving > bestSaving) {
      bestLength = len;
      bestRepeat = repeat;
      bestSaving = saving;
    }
  }

  if (bestRepeat < kMinPatternRepeat) {
    return undefined;
  }
  return { unit: data.slice(pos, pos + bestLength), repeat: bestRepeat };
}

/** ---- plain runs ---- */

export function countRun(data: Uint8Array, pos: number): number {
  if (pos >= data.length) {
    return 0;
  }
  const value = data[pos];
  let n = 1;
  while (pos + n < data.length && data[pos + n] === value && n < kMaxField) {
    n += 1;
  }
  return n;
}

export function detectRun(data: Uint8Array, pos: number): number | undefined {
  const n = countRun(data, pos);
  return n >= kMinRunLength ? n : undefined;
}
