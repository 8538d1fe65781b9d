import { defineEnum } from "../../utils/enum";
import { randomBelow, RandomSource } from "./random";

// Synthetic inputs for the benchmark, each aimed at one or more codec strategies.
export const kSyntheticPattern = defineEnum({
  zeros: { value: "zeros", title: "All zeros" },
  runs: { value: "runs", title: "Random runs" },
  sequence: { value: "sequence", title: "Incrementing" },
  pattern: { value: "pattern", title: "Repeating pattern" },
  nibbles: { value: "nibbles", title: "Small values <16" },
  mixed: { value: "mixed", title: "Mixed patterns" },
  random: { value: "random", title: "Random data" },
} as const);

export type SyntheticPatternKey = typeof kSyntheticPattern.$key;

const kRepeatUnit = [0x12, 0x34, 0x56, 0x78];

function fillRuns(data: Uint8Array, rand: RandomSource): void {
  let pos = 0;
  while (pos < data.length) {
    const value = rand() & 0x7f;
    const runLength = randomBelow(rand, 10) + 1;
    for (let i = 0; i < runLength && pos < data.length; i += 1, pos += 1) {
      data[pos] = value;
    }
  }
}

// chunks of 5..24 bytes, each zeros, a counter, a slow counter or noise
function fillMixed(data: Uint8Array, rand: RandomSource): void {
  let pos = 0;
  while (pos < data.length) {
    const choice = randomBelow(rand, 4);
    const chunkSize = randomBelow(rand, 20) + 5;
    for (let i = 0; i < chunkSize && pos < data.length; i += 1, pos += 1) {
      switch (choice) {
        case 0:
          data[pos] = 0x00;
          break;
        case 1:
          data[pos] = pos & 0x7f;
          break;
        case 2:
          data[pos] = Math.floor(pos / 3) & 0x7f;
          break;
        default:
          data[pos] = rand() & 0x7f;
          break;
      }
    }
  }
}

export function generatePattern(kind: SyntheticPatternKey, size: number, rand: RandomSource): Uint8Array {
  const data = new Uint8Array(size);
  switch (kind) {
    case "zeros":
      break;
    case "random":
      for (let i = 0; i < size; i += 1) data[i] = rand() & 0x7f;
      break;
    case "runs":
      fillRuns(data, rand);
      break;
    case "sequence":
      for (let i = 0; i < size; i += 1) data[i] = i % 128;
      break;
    case "pattern":
      for (let i = 0; i < size; i += 1) data[i] = kRepeatUnit[i % kRepeatUnit.length];
      break;
    case "nibbles":
      for (let i = 0; i < size; i += 1) data[i] = rand() & 0x0f;
      break;
    case "mixed":
      fillMixed(data, rand);
      break;
  }
  return data;
}
