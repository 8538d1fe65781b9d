#!/usr/bin/env node

import { Command } from "commander";
import { kCommonValueTableVersion } from "./backend/codec";
import { benchCommand } from "./frontend/bench";
import { demoCommand } from "./frontend/demo";
import { inspectCommand } from "./frontend/inspect";
import { CommandLineOptions } from "./frontend/parseOptions";
import { decodeCommand, encodeCommand } from "./frontend/transcode";
import * as cons from "./utils/console";
import { describeError } from "./utils/errorHandling";
import { getAppVersionString } from "./utils/versionString";

const kFormatHelp = "raw, hex or base64";

async function main(): Promise<void> {
  const program = new Command();

  program
    .name("bytepack")
    .description("Multi-strategy byte buffer codec")
    .version(getAppVersionString(kCommonValueTableVersion), "-v, --version", "Output version information")
    .option("-c, --config <path>", "Config file (default: ./bytepack.jsonc if present)")
    .option("--log-file <path>", "Append log output to this file");

  program
    .command("encode <input>")
    .alias("e")
    .description("Encode a file")
    .option("-o, --output <path>", "Output file (default: <input>.bpk)")
    .option("--codec <name>", "Codec: multi or rle")
    .option("--input-format <format>", `Input file format: ${kFormatHelp}`)
    .option("--output-format <format>", `Output file format: ${kFormatHelp}`)
    .action(async (input: string, _options: CommandLineOptions, command: Command) => {
      await encodeCommand(input, command.optsWithGlobals<CommandLineOptions>());
    });

  program
    .command("decode <input>")
    .alias("d")
    .description("Decode a file")
    .option("-o, --output <path>", "Output file (default: <input> without .bpk)")
    .option("--codec <name>", "Codec: multi or rle")
    .option("--input-format <format>", `Input file format: ${kFormatHelp}`)
    .option("--output-format <format>", `Output file format: ${kFormatHelp}`)
    .option("--max-output <bytes>", "Fail if the decoded output would exceed this size")
    .action(async (input: string, _options: CommandLineOptions, command: Command) => {
      await decodeCommand(input, command.optsWithGlobals<CommandLineOptions>());
    });

  program
    .command("inspect <input>")
    .alias("i")
    .description("List the records of an encoded file")
    .option("--input-format <format>", `Input file format: ${kFormatHelp}`)
    .action(async (input: string, _options: CommandLineOptions, command: Command) => {
      await inspectCommand(input, command.optsWithGlobals<CommandLineOptions>());
    });

  program
    .command("bench")
    .alias("b")
    .description("Compare the multi-strategy codec against simple RLE")
    .option("--seed <n>", "Random seed for the synthetic inputs")
    .option("--iterations <n>", "Iterations for the speed benchmark")
    .option("--size <n>", "Buffer size for the pattern and speed tests")
    .action(async (_options: CommandLineOptions, command: Command) => {
      await benchCommand(command.optsWithGlobals<CommandLineOptions>());
    });

  program
    .command("demo")
    .description("Encode the built-in example with both codecs")
    .action(async (_options: CommandLineOptions, command: Command) => {
      await demoCommand(command.optsWithGlobals<CommandLineOptions>());
    });

  await program.parseAsync(process.argv);
}

main().catch((e: unknown) => {
  cons.error(describeError(e));
  process.exit(1);
});
