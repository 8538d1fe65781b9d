import { createRandom } from "../bench/random";
import { decode } from "./decoder";
import { encode, encodeInto, planRecords, tryEncode } from "./encoder";
import { CodecError } from "./errors";

const bytes = (...values: number[]) => new Uint8Array(values);

function roundTrip(input: Uint8Array): Uint8Array {
  const encoded = encode(input);
  expect(decode(encoded)).toEqual(input);
  return encoded;
}

const kExample = bytes(
  0x03, 0x74, 0x04, 0x04, 0x04, 0x35, 0x35, 0x64, 0x64, 0x64, 0x64, 0x00,
  0x00, 0x00, 0x00, 0x00, 0x56, 0x45, 0x56, 0x56, 0x56, 0x09, 0x09, 0x09,
);

describe("encode", () => {
  it("returns nothing for empty input", () => {
    expect(encode(new Uint8Array())).toEqual(new Uint8Array());
  });

  it("stores a single byte as a literal", () => {
    expect(roundTrip(bytes(0x42))).toEqual(bytes(0x01, 0x42));
  });

  it("encodes the mixed example record by record", () => {
    expect(roundTrip(kExample)).toEqual(
      bytes(
        0x02, 0x03, 0x74, // literal
        0xf2, 0x34, // common value 0x04 x3
        0x02, 0x35, 0x35, // literal
        0x84, 0x64, // run 0x64 x4
        0xf0, 0x05, // zero run x5
        0x02, 0x56, 0x45, // literal
        0x83, 0x56, // run 0x56 x3
        0x83, 0x09, // run 0x09 x3
      ),
    );
  });

  it("uses the two byte zero-run record for the zero span of the example", () => {
    const zeroRun = planRecords(kExample).find((r) => r.kind === "zeroRun");
    expect(zeroRun).toEqual({ kind: "zeroRun", length: 5 });
  });

  it("encodes three zeros as a zero run", () => {
    expect(roundTrip(bytes(0x00, 0x00, 0x00))).toEqual(bytes(0xf0, 0x03));
  });

  it("encodes an incrementing counter as one delta record", () => {
    expect(roundTrip(bytes(0x10, 0x11, 0x12, 0x13, 0x14))).toEqual(bytes(0xc5, 0x10, 0x11));
  });

  it("encodes a decrementing counter across the 7-bit wrap", () => {
    expect(roundTrip(bytes(2, 1, 0, 127, 126))).toEqual(bytes(0xc5, 0x02, 0x0f));
  });

  it("packs an odd number of nibbles with a zero low half at the end", () => {
    expect(roundTrip(bytes(1, 2, 3, 5, 8))).toEqual(bytes(0x45, 0x12, 0x35, 0x80));
  });

  it("encodes a repeating unit as a pattern record", () => {
    const input = bytes(0x12, 0x34, 0x56, 0x12, 0x34, 0x56, 0x12, 0x34, 0x56, 0x99);
    expect(roundTrip(input)).toEqual(bytes(0xe0, 0x33, 0x12, 0x34, 0x56, 0x01, 0x99));
  });

  it("keeps high bytes out of delta records", () => {
    expect(roundTrip(bytes(0x80, 0x81, 0x82, 0x83))).toEqual(bytes(0x04, 0x80, 0x81, 0x82, 0x83));
  });

  describe("field boundaries", () => {
    it("fills a run record to 63 and splits after it", () => {
      expect(roundTrip(new Uint8Array(63).fill(0x41))).toEqual(bytes(0xbf, 0x41));
      expect(roundTrip(new Uint8Array(64).fill(0x41))).toEqual(bytes(0xbf, 0x41, 0x01, 0x41));
    });

    it("fills a zero run to 255 and splits after it", () => {
      expect(roundTrip(new Uint8Array(255))).toEqual(bytes(0xf0, 0xff));
      expect(roundTrip(new Uint8Array(256))).toEqual(bytes(0xf0, 0xff, 0x01, 0x00));
    });

    it("uses the common-value form up to 15 and a run record beyond", () => {
      expect(roundTrip(new Uint8Array(15).fill(0x01))).toEqual(bytes(0xf2, 0xf1));
      expect(roundTrip(new Uint8Array(16).fill(0x01))).toEqual(bytes(0x90, 0x01));
    });

    it("packs at most 62 nibbles per record", () => {
      const input = Uint8Array.from({ length: 63 }, (_, i) => (i * 7) % 16);
      const encoded = roundTrip(input);
      expect(encoded.length).toBe(34);
      expect(Array.from(encoded.subarray(0, 3))).toEqual([0x7e, 0x07, 0xe5]);
      expect(Array.from(encoded.subarray(32))).toEqual([0x01, 0x02]);
    });

    it("fills a delta record to 63 and splits after it", () => {
      const input = Uint8Array.from({ length: 64 }, (_, i) => i);
      expect(roundTrip(input)).toEqual(bytes(0xff, 0x00, 0x11, 0x01, 0x3f));
    });

    it("shortens delta records whose control byte would be a sentinel", () => {
      const counter = (n: number) => Uint8Array.from([...Array.from({ length: n }, (_, i) => i), 0x7f]);
      expect(roundTrip(counter(32))).toEqual(bytes(0xdf, 0x00, 0x11, 0x02, 0x1f, 0x7f));
      expect(roundTrip(counter(48))).toEqual(bytes(0xef, 0x00, 0x11, 0x02, 0x2f, 0x7f));
      roundTrip(counter(49));
      roundTrip(counter(50));
    });
  });

  it("falls back to literals for data without structure", () => {
    const input = Uint8Array.from({ length: 64 }, (_, i) => (i * 37) % 256);
    const encoded = roundTrip(input);
    expect(encoded.length).toBe(66);
    expect(encoded[0]).toBe(0x3f);
    expect(encoded[64]).toBe(0x01);
  });

  it("round-trips random full-range buffers", () => {
    const rand = createRandom(7);
    for (let size = 0; size < 300; size += 13) {
      roundTrip(Uint8Array.from({ length: size }, () => rand() & 0xff));
    }
  });

  it("round-trips random buffers biased toward small values and repeats", () => {
    const rand = createRandom(11);
    for (let n = 0; n < 50; n += 1) {
      const input = new Uint8Array(200);
      let pos = 0;
      while (pos < input.length) {
        const value = rand() % 3 === 0 ? rand() & 0x0f : rand() & 0xff;
        const run = (rand() % 5) + 1;
        for (let i = 0; i < run && pos < input.length; i += 1, pos += 1) {
          input[pos] = value;
        }
      }
      roundTrip(input);
    }
  });

  describe("capacity", () => {
    it("fails when the output would not fit", () => {
      const result = tryEncode(kExample, { maxOutputLength: 10 });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("CapacityExceeded");
      }
    });

    it("writes into a caller buffer", () => {
      const output = new Uint8Array(32);
      expect(encodeInto(bytes(0x00, 0x00, 0x00), output)).toBe(2);
      expect(Array.from(output.subarray(0, 2))).toEqual([0xf0, 0x03]);
    });

    it("leaves the caller buffer untouched when it is too small", () => {
      const output = new Uint8Array(4).fill(0xaa);
      expect(() => encodeInto(kExample, output)).toThrow(CodecError);
      expect(Array.from(output)).toEqual([0xaa, 0xaa, 0xaa, 0xaa]);
    });
  });
});
