import {
  countNibbles,
  countRun,
  countZeroRun,
  detectDeltaSequence,
  detectNibbleRun,
  detectRun,
  detectZeroRun,
  findPattern,
  measureDeltaSequence,
  patternSaving,
} from "./detectors";

const bytes = (...values: number[]) => new Uint8Array(values);

describe("codec detectors", () => {
  describe("zero runs", () => {
    it("counts zeros from the cursor", () => {
      expect(detectZeroRun(new Uint8Array(5), 0)).toBe(5);
      expect(countZeroRun(bytes(0x07, 0x00, 0x00, 0x01), 1)).toBe(2);
    });

    it("needs at least three zeros", () => {
      expect(detectZeroRun(bytes(0x00, 0x00, 0x05), 0)).toBeUndefined();
      expect(detectZeroRun(bytes(0x00, 0x00, 0x00), 0)).toBe(3);
    });

    it("caps at 255", () => {
      expect(countZeroRun(new Uint8Array(300), 0)).toBe(255);
      expect(countZeroRun(new Uint8Array(300), 100)).toBe(200);
    });
  });

  describe("delta sequences", () => {
    it("reports length and step of an incrementing run", () => {
      expect(detectDeltaSequence(bytes(0x10, 0x11, 0x12, 0x13, 0x14), 0)).toEqual({ length: 5, delta: 1 });
    });

    it("follows negative steps through the 7-bit wrap", () => {
      expect(detectDeltaSequence(bytes(2, 1, 0, 127, 126), 0)).toEqual({ length: 5, delta: -1 });
      expect(detectDeltaSequence(bytes(120, 125, 2, 7), 0)).toEqual({ length: 4, delta: 5 });
    });

    it("rejects steps outside -15..15", () => {
      expect(measureDeltaSequence(bytes(0, 16, 32, 48), 0)).toEqual({ length: 4, delta: 16 });
      expect(detectDeltaSequence(bytes(0, 16, 32, 48), 0)).toBeUndefined();
      expect(detectDeltaSequence(bytes(30, 15, 0), 0)).toEqual({ length: 3, delta: -15 });
    });

    it("does not apply to bytes with the high bit set", () => {
      expect(measureDeltaSequence(bytes(0x80, 0x81, 0x82, 0x83), 0)).toBeUndefined();
      expect(measureDeltaSequence(bytes(0x7e, 0x7f, 0x80), 0)).toEqual({ length: 2, delta: 1 });
    });

    it("needs two bytes and a length of three", () => {
      expect(measureDeltaSequence(bytes(0x05), 0)).toBeUndefined();
      expect(detectDeltaSequence(bytes(0x05, 0x06, 0x09), 0)).toBeUndefined();
    });

    it("caps at 63 values", () => {
      const counter = Uint8Array.from({ length: 100 }, (_, i) => i);
      expect(detectDeltaSequence(counter, 0)).toEqual({ length: 63, delta: 1 });
    });
  });

  describe("nibble runs", () => {
    it("counts values below 16", () => {
      expect(detectNibbleRun(bytes(1, 15, 3, 9, 0x10), 0)).toBe(4);
      expect(detectNibbleRun(bytes(1, 15, 3, 0x10), 0)).toBeUndefined();
    });

    it("caps at 62", () => {
      expect(countNibbles(new Uint8Array(80).fill(0x0a), 0)).toBe(62);
    });
  });

  describe("patterns", () => {
    it("finds the repeating unit and its count", () => {
      const data = bytes(0x12, 0x34, 0x56, 0x12, 0x34, 0x56, 0x12, 0x34, 0x56, 0x99);
      const match = findPattern(data, 0);
      expect(match?.unit).toEqual(bytes(0x12, 0x34, 0x56));
      expect(match?.repeat).toBe(3);
    });

    it("prefers the unit saving the most bytes", () => {
      // [a b a b a b a b] x 2 is also [a b] x 8; the short unit saves more
      const data = bytes(0x61, 0x62, 0x61, 0x62, 0x61, 0x62, 0x61, 0x62, 0x61, 0x62, 0x61, 0x62, 0x61, 0x62, 0x61, 0x62);
      const match = findPattern(data, 0);
      expect(match?.unit).toEqual(bytes(0x61, 0x62));
      expect(match?.repeat).toBe(8);
      expect(patternSaving(2, 8)).toBe(12);
    });

    it("caps the repeat count at 15", () => {
      // 16 units of [A B]; only 15 fit the count field. [A B A B] x 8 saves the same and loses the tie.
      const data = Uint8Array.from({ length: 32 }, (_, i) => (i % 2 === 0 ? 0x41 : 0x42));
      const match = findPattern(data, 0);
      expect(match?.unit).toEqual(bytes(0x41, 0x42));
      expect(match?.repeat).toBe(15);
    });

    it("returns undefined without a second full unit", () => {
      expect(findPattern(bytes(0x12, 0x34, 0x12), 0)).toBeUndefined();
      expect(findPattern(bytes(0x12, 0x34, 0x56, 0x78), 0)).toBeUndefined();
    });

    it("never picks a unit longer than 15 bytes", () => {
      const unit = Array.from({ length: 16 }, (_, i) => 0x20 + i * 3);
      expect(findPattern(Uint8Array.from([...unit, ...unit]), 0)).toBeUndefined();
    });
  });

  describe("plain runs", () => {
    it("counts equal bytes up to 63", () => {
      expect(detectRun(bytes(0x41, 0x41, 0x41, 0x42), 0)).toBe(3);
      expect(detectRun(bytes(0x41, 0x41, 0x42), 0)).toBeUndefined();
      expect(countRun(new Uint8Array(70).fill(0x99), 0)).toBe(63);
      expect(countRun(bytes(), 0)).toBe(0);
    });
  });
});
