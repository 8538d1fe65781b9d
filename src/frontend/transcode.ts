import * as cons from "../utils/console";
import { readDataFormat, resolveByteCodec, resolveDataFormat, writeDataFormat } from "../utils/encoding/codecRegistry";
import { readBinaryFileAsync, writeBinaryFile } from "../utils/fileSystem";
import { formatBytes, savedPercent } from "../utils/utils";
import { CommandLineOptions, loadCommandConfig } from "./parseOptions";

// default output: <input>.bpk when encoding, <input>.out when decoding
function defaultOutputPath(inputPath: string, direction: "encode" | "decode"): string {
  if (direction === "encode") {
    return `${inputPath}.bpk`;
  }
  return inputPath.endsWith(".bpk") ? inputPath.slice(0, -".bpk".length) : `${inputPath}.out`;
}

async function transcode(direction: "encode" | "decode", inputPath: string, options?: CommandLineOptions) {
  const config = loadCommandConfig(options);
  const codec = resolveByteCodec(config.codec);
  const inputFormat = resolveDataFormat(options?.inputFormat ?? "raw");
  const outputFormat = resolveDataFormat(options?.outputFormat ?? "raw");
  const outputPath = options?.output ?? defaultOutputPath(inputPath, direction);

  const input = readDataFormat(inputFormat, await readBinaryFileAsync(inputPath));
  const startTime = Date.now();
  const output =
    direction === "encode" ? codec.encode(input) : codec.decode(input, config.decode.maxOutputLength);
  const duration = Date.now() - startTime;

  await writeBinaryFile(outputPath, writeDataFormat(outputFormat, output));

  cons.h1(`${direction === "encode" ? "Encoded" : "Decoded"} with ${codec.title}:`);
  cons.info(`  ${inputPath} -> ${outputPath}`);
  cons.info(`  ${formatBytes(input.length)} -> ${formatBytes(output.length)}`);
  if (direction === "encode") {
    cons.info(`  saved ${savedPercent(input.length, output.length).toFixed(1)}%`);
  }
  cons.dim(`  (${duration}ms)`);
}

export async function encodeCommand(inputPath: string, options?: CommandLineOptions): Promise<void> {
  await transcode("encode", inputPath, options);
}

export async function decodeCommand(inputPath: string, options?: CommandLineOptions): Promise<void> {
  await transcode("decode", inputPath, options);
}
