import * as cons from "../utils/console";
import { allByteCodecs } from "../utils/encoding/codecRegistry";
import { formatHexBytes } from "../utils/encoding/hex";
import { bytesEqual, savedPercent } from "../utils/utils";
import { CommandLineOptions, loadCommandConfig } from "./parseOptions";

// runs, a zero span, short literals and a common value
export const kDemoInput = new Uint8Array([
  0x03, 0x74, 0x04, 0x04, 0x04, 0x35, 0x35, 0x64, 0x64, 0x64, 0x64, 0x00, 0x00, 0x00, 0x00, 0x00, 0x56, 0x45, 0x56,
  0x56, 0x56, 0x09, 0x09, 0x09,
]);

export async function demoCommand(options?: CommandLineOptions): Promise<void> {
  loadCommandConfig(options);

  cons.h1(`Original data (${kDemoInput.length} bytes):`);
  for (const line of formatHexBytes(kDemoInput)) {
    cons.plain(line);
  }

  const failed: string[] = [];
  for (const codec of allByteCodecs()) {
    const encoded = codec.encode(kDemoInput);
    const saved = savedPercent(kDemoInput.length, encoded.length);
    cons.plain("");
    cons.h1(`${codec.title} (${encoded.length} bytes, ${saved.toFixed(1)}% saved):`);
    for (const line of formatHexBytes(encoded)) {
      cons.plain(line);
    }

    if (bytesEqual(codec.decode(encoded), kDemoInput)) {
      cons.success(`${codec.title} decompression: PASSED`);
    } else {
      cons.error(`${codec.title} decompression: FAILED`);
      failed.push(codec.title);
    }
  }

  if (failed.length > 0) {
    throw new Error(`Demo round trip failed for: ${failed.join(", ")}`);
  }
}
