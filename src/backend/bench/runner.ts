import { CodecError } from "../codec/errors";
import { ByteCodec } from "../../utils/encoding/codecRegistry";
import { capture } from "../../utils/errorHandling";
import { bytesEqual, savedPercent } from "../../utils/utils";
import { generatePattern, kSyntheticPattern, SyntheticPatternKey } from "./patterns";
import { RandomSource } from "./random";

export type Clock = () => number; // milliseconds

const defaultClock: Clock = () => performance.now();

export interface TestResult {
  originalSize: number;
  compressedSize: number;
  ratio: number; // percent saved
  compressTimeMs: number;
  decompressTimeMs: number;
  verified: boolean;
}

export interface ComparisonRow {
  name: string;
  baseline: TestResult;
  candidate: TestResult;
}

export interface SpeedResult {
  codec: string;
  iterations: number;
  totalMs: number;
  microsPerOp: number;
  megabytesPerSecond: number;
}

export function runSingleTest(codec: ByteCodec, data: Uint8Array, clock: Clock = defaultClock): TestResult {
  let start = clock();
  const encoded = codec.encode(data);
  const compressTimeMs = clock() - start;

  start = clock();
  const decoded = capture(() => codec.decode(encoded), CodecError);
  const decompressTimeMs = clock() - start;

  return {
    originalSize: data.length,
    compressedSize: encoded.length,
    ratio: savedPercent(data.length, encoded.length),
    compressTimeMs,
    decompressTimeMs,
    verified: decoded.ok && bytesEqual(decoded.value, data),
  };
}

export function compareOn(
  name: string,
  data: Uint8Array,
  baseline: ByteCodec,
  candidate: ByteCodec,
  clock: Clock = defaultClock,
): ComparisonRow {
  return {
    name,
    baseline: runSingleTest(baseline, data, clock),
    candidate: runSingleTest(candidate, data, clock),
  };
}

export function comparePatterns(
  patterns: SyntheticPatternKey[],
  size: number,
  rand: RandomSource,
  baseline: ByteCodec,
  candidate: ByteCodec,
  clock: Clock = defaultClock,
): ComparisonRow[] {
  return patterns.map((kind) =>
    compareOn(kSyntheticPattern.byKey[kind].title, generatePattern(kind, size, rand), baseline, candidate, clock),
  );
}

export function compareSizes(
  sizes: number[],
  rand: RandomSource,
  baseline: ByteCodec,
  candidate: ByteCodec,
  clock: Clock = defaultClock,
): ComparisonRow[] {
  return sizes.map((size) => compareOn(`${size} bytes`, generatePattern("mixed", size, rand), baseline, candidate, clock));
}

export function measureSpeed(
  codec: ByteCodec,
  data: Uint8Array,
  iterations: number,
  clock: Clock = defaultClock,
): SpeedResult {
  const start = clock();
  for (let i = 0; i < iterations; i += 1) {
    codec.encode(data);
  }
  const totalMs = clock() - start;
  const totalBytes = data.length * iterations;
  return {
    codec: codec.title,
    iterations,
    totalMs,
    microsPerOp: iterations > 0 ? (totalMs * 1000) / iterations : 0,
    megabytesPerSecond: totalMs > 0 ? totalBytes / (totalMs * 1000) : 0,
  };
}

export function averageRatio(results: TestResult[]): number {
  if (results.length === 0) {
    return 0;
  }
  return results.reduce((sum, r) => sum + r.ratio, 0) / results.length;
}
