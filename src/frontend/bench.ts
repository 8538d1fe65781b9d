import { generatePattern } from "../backend/bench/patterns";
import { createRandom } from "../backend/bench/random";
import { ComparisonLabels, renderComparisonTable } from "../backend/bench/report";
import { averageRatio, compareOn, comparePatterns, compareSizes, measureSpeed } from "../backend/bench/runner";
import * as cons from "../utils/console";
import { resolveByteCodec } from "../utils/encoding/codecRegistry";
import { kDemoInput } from "./demo";
import { CommandLineOptions, loadCommandConfig } from "./parseOptions";

const kLabels: ComparisonLabels = {
  baseline: "Simple RLE",
  candidate: "Advanced Multi",
  baselineShort: "Simple",
  candidateShort: "Advanced",
};

function section(title: string): void {
  cons.plain("");
  cons.h1(title);
  cons.dim(`   ${"─".repeat(title.length)}`);
}

export async function benchCommand(options?: CommandLineOptions): Promise<void> {
  const config = loadCommandConfig(options);
  const { seed, patternSize, sizes, iterations, patterns } = config.bench;
  const rand = createRandom(seed);
  const baseline = resolveByteCodec("rle");
  const candidate = resolveByteCodec("multi");

  cons.h1("COMPRESSION ALGORITHM PERFORMANCE COMPARISON");
  cons.dim(`seed ${seed}`);

  section("1. ORIGINAL EXAMPLE TEST");
  const example = compareOn("example", kDemoInput, baseline, candidate);
  for (const [title, result] of [
    [baseline.title, example.baseline],
    [candidate.title, example.candidate],
  ] as const) {
    cons.info(`   ${title}:`);
    cons.plain(
      `   • Compression: ${result.originalSize} -> ${result.compressedSize} bytes (${result.ratio.toFixed(1)}% saved)`,
    );
    cons.plain(
      `   • Time: ${result.compressTimeMs.toFixed(3)} ms compress, ${result.decompressTimeMs.toFixed(3)} ms decompress`,
    );
    if (result.verified) {
      cons.success("   • Verification: PASSED");
    } else {
      cons.error("   • Verification: FAILED");
    }
  }

  section(`2. PATTERN-BASED PERFORMANCE TESTS (${patternSize} bytes each)`);
  const patternRows = comparePatterns(patterns, patternSize, rand, baseline, candidate);
  for (const line of renderComparisonTable(patternRows, kLabels)) {
    cons.plain(line);
  }

  section("3. SIZE SCALING TESTS (Mixed Pattern)");
  const sizeRows = compareSizes(sizes, rand, baseline, candidate);
  for (const line of renderComparisonTable(sizeRows, kLabels)) {
    cons.plain(line);
  }

  section(`4. SPEED BENCHMARK (${iterations} iterations on ${patternSize}-byte buffer)`);
  const benchData = generatePattern("mixed", patternSize, rand);
  for (const codec of [baseline, candidate]) {
    const speed = measureSpeed(codec, benchData, iterations);
    cons.info(`   ${speed.codec}:`);
    cons.plain(
      `   • Compression: ${speed.totalMs.toFixed(2)} ms total, ${speed.microsPerOp.toFixed(4)} µs per operation`,
    );
    cons.plain(`   • Throughput: ${speed.megabytesPerSecond.toFixed(2)} MB/s`);
  }

  section("5. SUMMARY");
  const avgBaseline = averageRatio(patternRows.map((r) => r.baseline));
  const avgCandidate = averageRatio(patternRows.map((r) => r.candidate));
  cons.plain(
    `   • Average compression: ${baseline.title} = ${avgBaseline.toFixed(1)}%, ${candidate.title} = ${avgCandidate.toFixed(1)}%`,
  );
  cons.plain(`   • Difference: ${(avgCandidate - avgBaseline).toFixed(1)} percentage points`);

  const failures = [...patternRows, ...sizeRows, example].filter((r) => !r.baseline.verified || !r.candidate.verified);
  if (failures.length > 0) {
    throw new Error(`Round-trip verification failed for: ${failures.map((r) => r.name).join(", ")}`);
  }
}
