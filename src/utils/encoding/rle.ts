// Baseline byte-wise RLE, the comparison point for the multi-strategy codec.
//   1nnnnnnn v   -> v repeated n times (n in 2..127)
//   0nnnnnnn ... -> n raw bytes follow (n in 1..127)

import { CodecError } from "../../backend/codec/errors";

const kRunFlag = 0x80;
const kMinRun = 2;
const kMaxCount = 127;

function runLengthAt(data: Uint8Array, pos: number): number {
  const value = data[pos];
  let n = 1;
  while (pos + n < data.length && data[pos + n] === value && n < kMaxCount) {
    n += 1;
  }
  return n;
}

export function rleCompress(data: Uint8Array): Uint8Array {
  if (data.length === 0) {
    return new Uint8Array();
  }

  const out: number[] = [];
  let i = 0;
  while (i < data.length) {
    const run = runLengthAt(data, i);
    if (run >= kMinRun) {
      out.push(kRunFlag | run, data[i]);
      i += run;
      continue;
    }

    const start = i;
    while (i < data.length && i - start < kMaxCount && runLengthAt(data, i) < kMinRun) {
      i += 1;
    }
    out.push(i - start);
    for (let j = start; j < i; j += 1) {
      out.push(data[j]);
    }
  }

  return new Uint8Array(out);
}

export function rleDecompress(data: Uint8Array): Uint8Array {
  const out: number[] = [];
  let i = 0;
  while (i < data.length) {
    const control = data[i];
    const count = control & kMaxCount;
    if (control & kRunFlag) {
      if (i + 1 >= data.length) {
        throw new CodecError("MalformedStream", "RLE decode: truncated run", i);
      }
      const value = data[i + 1];
      for (let j = 0; j < count; j += 1) {
        out.push(value);
      }
      i += 2;
    } else {
      if (i + 1 + count > data.length) {
        throw new CodecError("MalformedStream", "RLE decode: truncated literal", i);
      }
      for (let j = 0; j < count; j += 1) {
        out.push(data[i + 1 + j]);
      }
      i += 1 + count;
    }
  }
  return new Uint8Array(out);
}
