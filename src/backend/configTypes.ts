import { SyntheticPatternKey } from "./bench/patterns";
import { ByteCodecKey } from "../utils/encoding/codecRegistry";

export interface BenchConfig {
  seed: number;
  patternSize: number;
  sizes: number[];
  iterations: number;
  patterns: SyntheticPatternKey[];
}

export interface BytepackConfig {
  codec: ByteCodecKey;
  logFile?: string;
  decode: {
    maxOutputLength?: number;
  };
  bench: BenchConfig;
}

// shape of bytepack.jsonc, and of every other config layer (env, command line)
export interface BytepackConfigLayer {
  codec?: ByteCodecKey;
  logFile?: string;
  decode?: {
    maxOutputLength?: number;
  };
  bench?: Partial<BenchConfig>;
}

export const kDefaultConfig: BytepackConfig = {
  codec: "multi",
  decode: {},
  bench: {
    seed: 1,
    patternSize: 256,
    sizes: [16, 64, 256, 1024, 4096],
    iterations: 10000,
    patterns: ["zeros", "runs", "sequence", "pattern", "nibbles", "mixed", "random"],
  },
};
