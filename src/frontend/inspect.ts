import { describeRecord, inspect } from "../backend/codec";
import * as cons from "../utils/console";
import { readDataFormat, resolveDataFormat } from "../utils/encoding/codecRegistry";
import { readBinaryFileAsync } from "../utils/fileSystem";
import { CommandLineOptions, loadCommandConfig } from "./parseOptions";

// lines of the record listing, e.g. "     0  f0 05          zero run x5"
export function formatRecordListing(encoded: Uint8Array): string[] {
  return inspect(encoded).map(({ record, offset, next }) => {
    const raw = Array.from(encoded.subarray(offset, Math.min(next, offset + 4)), (b) => b.toString(16).padStart(2, "0"));
    const rawText = next - offset > 4 ? `${raw.join(" ")} ..` : raw.join(" ");
    return `${String(offset).padStart(6)}  ${rawText.padEnd(15)}${describeRecord(record)}`;
  });
}

export async function inspectCommand(inputPath: string, options?: CommandLineOptions): Promise<void> {
  loadCommandConfig(options);
  const format = resolveDataFormat(options?.inputFormat ?? "raw");
  const encoded = readDataFormat(format, await readBinaryFileAsync(inputPath));

  const lines = formatRecordListing(encoded);
  cons.h1(`${inputPath}: ${lines.length} records, ${encoded.length} bytes`);
  for (const line of lines) {
    cons.plain(line);
  }
}
