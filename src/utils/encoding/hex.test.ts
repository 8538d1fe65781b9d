import { decodeHexString, encodeHexString, formatHexBytes } from "./hex";

describe("hex helpers", () => {
  it("accepts spaced, packed and 0x-prefixed input", () => {
    const expected = new Uint8Array([0x4a, 0x6f, 0x68, 0x6e]);
    expect(decodeHexString("4a 6f 68 6e")).toEqual(expected);
    expect(decodeHexString("4A6F686E")).toEqual(expected);
    expect(decodeHexString("0x4a, 0x6f,\n0x68, 0x6e")).toEqual(expected);
  });

  it("rejects odd lengths and bad digits", () => {
    expect(() => decodeHexString("abc")).toThrow("hex decode: input length 3 is not even");
    expect(() => decodeHexString("zz")).toThrow("hex decode: invalid byte 'zz' at index 0");
  });

  it("encodes lowercase without separators", () => {
    expect(encodeHexString(new Uint8Array([0x00, 0xab, 0x10]))).toBe("00ab10");
  });

  it("formats bytes for display", () => {
    const data = new Uint8Array([0x03, 0x74, 0xf2, 0x34, 0x02]);
    expect(formatHexBytes(data, 4)).toEqual(["0x03 0x74 0xF2 0x34", "0x02"]);
    expect(formatHexBytes(new Uint8Array())).toEqual([]);
  });
});
