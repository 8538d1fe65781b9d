import { BytepackConfig, BytepackConfigLayer } from "../backend/configTypes";
import { loadEnvFiles, resolveConfig } from "../backend/configLoader";
import * as cons from "../utils/console";
import { kByteCodec } from "../utils/encoding/codecRegistry";
import { TryParseInt } from "../utils/utils";

export type CommandLineOptions = {
  config?: string;
  logFile?: string;
  output?: string;
  codec?: string;
  inputFormat?: string;
  outputFormat?: string;
  maxOutput?: string;
  seed?: string;
  iterations?: string;
  size?: string;
};

function parseIntOption(name: string, value: string, min: number): number {
  const n = TryParseInt(value);
  if (n === null || n < min) {
    throw new Error(`Invalid value for ${name}: '${value}' (expected an integer >= ${min})`);
  }
  return n;
}

// turns command line flags into the topmost config layer.
export function parseConfigOverrides(cmd?: CommandLineOptions | undefined): BytepackConfigLayer {
  const layer: BytepackConfigLayer = {};
  if (!cmd) {
    return layer;
  }
  if (cmd.codec !== undefined) {
    const info = kByteCodec.coerceByKey(cmd.codec);
    if (!info) {
      throw new Error(`Unsupported codec: ${cmd.codec} (expected one of ${kByteCodec.keys.join(", ")})`);
    }
    layer.codec = info.key;
  }
  if (cmd.logFile) {
    layer.logFile = cmd.logFile;
  }
  if (cmd.maxOutput !== undefined) {
    layer.decode = { maxOutputLength: parseIntOption("--max-output", cmd.maxOutput, 0) };
  }

  const bench: BytepackConfigLayer["bench"] = {};
  if (cmd.seed !== undefined) {
    bench.seed = parseIntOption("--seed", cmd.seed, 0);
  }
  if (cmd.iterations !== undefined) {
    bench.iterations = parseIntOption("--iterations", cmd.iterations, 1);
  }
  if (cmd.size !== undefined) {
    bench.patternSize = parseIntOption("--size", cmd.size, 1);
  }
  if (Object.keys(bench).length > 0) {
    layer.bench = bench;
  }
  return layer;
}

// Loads .env files, resolves the config layers and points the log at the configured file.
export function loadCommandConfig(cmd?: CommandLineOptions | undefined): BytepackConfig {
  loadEnvFiles(process.cwd());
  const config = resolveConfig({ configPath: cmd?.config, overrides: parseConfigOverrides(cmd) });
  if (config.logFile) {
    cons.setLogFile(config.logFile);
  }
  return config;
}
