import { CodecError } from "../../backend/codec";
import { allByteCodecs, readDataFormat, resolveByteCodec, resolveDataFormat, writeDataFormat } from "./codecRegistry";

const textOf = (data: Uint8Array) => new TextDecoder().decode(data);
const textBytes = (text: string) => new TextEncoder().encode(text);

describe("codec registry", () => {
  it("lists both codecs in declaration order", () => {
    expect(allByteCodecs().map((c) => c.title)).toEqual(["Advanced Multi-Strategy", "Simple RLE"]);
  });

  it("round-trips through each codec", () => {
    const input = new Uint8Array([7, 7, 7, 7, 1, 2, 3, 0, 0, 0]);
    for (const codec of allByteCodecs()) {
      expect(codec.decode(codec.encode(input))).toEqual(input);
    }
  });

  it("rejects unknown codec names", () => {
    expect(() => resolveByteCodec("lzw")).toThrow("Unsupported codec: lzw (expected one of multi, rle)");
  });

  it("enforces the output limit for both codecs", () => {
    const input = new Uint8Array(50).fill(0x22);
    for (const codec of allByteCodecs()) {
      expect(() => codec.decode(codec.encode(input), 49)).toThrow(CodecError);
      expect(codec.decode(codec.encode(input), 50)).toEqual(input);
    }
  });
});

describe("data formats", () => {
  const data = new Uint8Array([0xf0, 0x05, 0x41]);

  it("writes hex and base64 as one line of text", () => {
    expect(textOf(writeDataFormat("hex", data))).toBe("f00541\n");
    expect(textOf(writeDataFormat("base64", data))).toBe("8AVB\n");
    expect(writeDataFormat("raw", data)).toBe(data);
  });

  it("reads what it writes", () => {
    expect(readDataFormat("hex", textBytes("f0 05 41\n"))).toEqual(data);
    expect(readDataFormat("base64", textBytes("8AVB\n"))).toEqual(data);
  });

  it("resolves format names", () => {
    expect(resolveDataFormat("base64")).toBe("base64");
    expect(() => resolveDataFormat("bin")).toThrow("Unsupported data format: bin (expected one of raw, hex, base64)");
  });
});
