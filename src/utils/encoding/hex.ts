// hex string helpers
// e.g. "4a 6f 68 6e", "4a6f686e" or "0x4a, 0x6f" <--> Uint8Array [0x4a, 0x6f, 0x68, 0x6e]

export function decodeHexString(input: string): Uint8Array {
  const cleaned = input.replace(/0x/gi, "").replace(/[\s,]+/g, "");
  if (cleaned.length % 2 !== 0) {
    throw new Error(`hex decode: input length ${cleaned.length} is not even`);
  }

  const out = new Uint8Array(cleaned.length / 2);
  for (let i = 0; i < cleaned.length; i += 2) {
    const byteStr = cleaned.slice(i, i + 2);
    if (!/^[0-9a-f]{2}$/i.test(byteStr)) {
      throw new Error(`hex decode: invalid byte '${byteStr}' at index ${i}`);
    }
    out[i / 2] = Number.parseInt(byteStr, 16);
  }
  return out;
}

export function encodeHexString(data: Uint8Array): string {
  let out = "";
  for (const byte of data) {
    out += byte.toString(16).padStart(2, "0");
  }
  return out;
}

// "0x03 0x74 0x04 ..." split into lines of `perLine` bytes.
export function formatHexBytes(data: Uint8Array, perLine: number = 8): string[] {
  const lines: string[] = [];
  for (let i = 0; i < data.length; i += perLine) {
    const chunk = Array.from(data.subarray(i, i + perLine), (b) => `0x${b.toString(16).toUpperCase().padStart(2, "0")}`);
    lines.push(chunk.join(" "));
  }
  return lines;
}
