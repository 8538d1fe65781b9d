import Ajv from "ajv";
import { config as loadDotenv } from "dotenv";
import * as fs from "fs";
import { parse as parseJsonc, ParseError, printParseErrorCode } from "jsonc-parser";
import * as path from "path";

import configSchema from "../../bytepack.schema.json";

import { BytepackConfig, BytepackConfigLayer, kDefaultConfig } from "./configTypes";
import { TryParseInt } from "../utils/utils";

export const kConfigFileName = "bytepack.jsonc";

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public errors: unknown[],
  ) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = "ConfigLoadError";
  }
}

const ajv = new Ajv({ allErrors: true });
const validateLayer = ajv.compile<BytepackConfigLayer>(configSchema);

export function validateConfig(data: unknown, source: string): BytepackConfigLayer {
  if (!validateLayer(data)) {
    const errorMessages = validateLayer.errors?.map((e) => `${e.instancePath || "/"} ${e.message}`) || [];
    throw new ConfigValidationError(
      `Config validation failed (${source}):\n${errorMessages.join("\n")}`,
      validateLayer.errors || [],
    );
  }
  return data;
}

export function parseConfigText(text: string, source: string): BytepackConfigLayer {
  const errors: ParseError[] = [];
  const parsed: unknown = parseJsonc(text, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const first = errors[0];
    throw new ConfigLoadError(`Failed to parse ${source}: ${printParseErrorCode(first.error)} at offset ${first.offset}`);
  }
  return validateConfig(parsed ?? {}, source);
}

export function loadConfigFile(filePath: string): BytepackConfigLayer {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigLoadError(`Failed to read config file: ${filePath}`, error instanceof Error ? error : undefined);
  }
  return parseConfigText(text, filePath);
}

// .env.local is loaded first so its values win over .env; real environment variables win over both.
export function loadEnvFiles(dir: string): void {
  loadDotenv({ path: path.join(dir, ".env.local") });
  loadDotenv({ path: path.join(dir, ".env") });
}

// BYTEPACK_LOG_FILE / BYTEPACK_SEED
export function envConfigLayer(env: NodeJS.ProcessEnv): BytepackConfigLayer {
  const layer: BytepackConfigLayer = {};
  if (env.BYTEPACK_LOG_FILE) {
    layer.logFile = env.BYTEPACK_LOG_FILE;
  }
  if (env.BYTEPACK_SEED !== undefined) {
    const seed = TryParseInt(env.BYTEPACK_SEED);
    if (seed === null || seed < 0) {
      throw new ConfigLoadError(`BYTEPACK_SEED must be a non-negative integer, got '${env.BYTEPACK_SEED}'`);
    }
    layer.bench = { seed };
  }
  return layer;
}

// explicit path, then BYTEPACK_CONFIG, then bytepack.jsonc in the working directory if present.
export function resolveConfigPath(
  explicitPath: string | undefined,
  env: NodeJS.ProcessEnv,
  cwd: string,
): string | undefined {
  const requested = explicitPath ?? env.BYTEPACK_CONFIG;
  if (requested) {
    const absolute = path.resolve(cwd, requested);
    if (!fs.existsSync(absolute)) {
      throw new ConfigLoadError(`Config file not found: ${absolute}`);
    }
    return absolute;
  }
  const candidate = path.join(cwd, kConfigFileName);
  return fs.existsSync(candidate) ? candidate : undefined;
}

export function mergeConfig(base: BytepackConfig, layer: BytepackConfigLayer): BytepackConfig {
  return {
    codec: layer.codec ?? base.codec,
    logFile: layer.logFile ?? base.logFile,
    decode: { ...base.decode, ...layer.decode },
    bench: { ...base.bench, ...layer.bench },
  };
}

export interface ResolveConfigOptions {
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: BytepackConfigLayer; // command-line flags
}

// defaults < config file < environment < command line
export function resolveConfig(options: ResolveConfigOptions = {}): BytepackConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  let resolved = kDefaultConfig;
  const filePath = resolveConfigPath(options.configPath, env, cwd);
  if (filePath) {
    resolved = mergeConfig(resolved, loadConfigFile(filePath));
  }
  resolved = mergeConfig(resolved, envConfigLayer(env));
  if (options.overrides) {
    resolved = mergeConfig(resolved, options.overrides);
  }
  return resolved;
}
