import { commonValueIndex } from "./commonValues";
import {
  detectDeltaSequence,
  detectNibbleRun,
  detectRun,
  detectZeroRun,
  findPattern,
} from "./detectors";
import { clampDeltaLength, kMaxNibbleField } from "./format";
import { CodecRecord, recordSaving } from "./records";

// Candidate records at `pos`, in priority order:
// zero run, delta, nibble, pattern, run (common-value form where possible).
export function candidatesAt(data: Uint8Array, pos: number): CodecRecord[] {
  const candidates: CodecRecord[] = [];

  const zeros = detectZeroRun(data, pos);
  if (zeros !== undefined) {
    candidates.push({ kind: "zeroRun", length: zeros });
  }

  const seq = detectDeltaSequence(data, pos);
  if (seq !== undefined) {
    candidates.push({ kind: "delta", length: clampDeltaLength(seq.length), start: data[pos], delta: seq.delta });
  }

  const nibbles = detectNibbleRun(data, pos);
  if (nibbles !== undefined) {
    candidates.push({ kind: "nibble", values: data.slice(pos, pos + nibbles) });
  }

  const pattern = findPattern(data, pos);
  if (pattern !== undefined) {
    candidates.push({ kind: "pattern", unit: pattern.unit, repeat: pattern.repeat });
  }

  const run = detectRun(data, pos);
  if (run !== undefined) {
    const value = data[pos];
    const index = commonValueIndex(value);
    if (index !== undefined && run <= kMaxNibbleField) {
      candidates.push({ kind: "commonValue", length: run, index });
    } else {
      candidates.push({ kind: "run", length: run, value });
    }
  }

  return candidates;
}

// The applicable record saving the most bytes at `pos`; on a tie the earlier strategy in
// priority order wins. undefined means only a literal can encode this position.
export function selectRecord(data: Uint8Array, pos: number): CodecRecord | undefined {
  let best: CodecRecord | undefined;
  let bestSaving = -Infinity;
  for (const candidate of candidatesAt(data, pos)) {
    const saving = recordSaving(candidate);
    if (saving > bestSaving) {
      best = candidate;
      bestSaving = saving;
    }
  }
  return best;
}

// Literal accumulation stops in front of any position another strategy can take.
export function shouldEndLiteral(data: Uint8Array, pos: number): boolean {
  return selectRecord(data, pos) !== undefined;
}
