import { CodecError, decode, encode } from "../../backend/codec";
import { defineEnum } from "../enum";
import { decodeHexString, encodeHexString } from "./hex";
import { rleCompress, rleDecompress } from "./rle";

/** ---- byte codecs ---- */

export const kByteCodec = defineEnum({
  multi: { value: "multi", title: "Advanced Multi-Strategy" },
  rle: { value: "rle", title: "Simple RLE" },
} as const);

export type ByteCodecKey = typeof kByteCodec.$key;

export type ByteCodec = {
  key: ByteCodecKey;
  title: string;
  encode: (data: Uint8Array) => Uint8Array;
  decode: (data: Uint8Array, maxOutputLength?: number) => Uint8Array;
};

const byteCodecs: Record<ByteCodecKey, ByteCodec> = {
  multi: {
    key: "multi",
    title: kByteCodec.byKey.multi.title,
    encode: (data) => encode(data),
    decode: (data, maxOutputLength) => decode(data, { maxOutputLength }),
  },
  rle: {
    key: "rle",
    title: kByteCodec.byKey.rle.title,
    encode: (data) => rleCompress(data),
    decode: (data, maxOutputLength) => {
      const out = rleDecompress(data);
      if (maxOutputLength !== undefined && out.length > maxOutputLength) {
        throw new CodecError("CapacityExceeded", `RLE decode: output needs ${out.length} bytes but capacity is ${maxOutputLength}`);
      }
      return out;
    },
  },
};

export function resolveByteCodec(key: string): ByteCodec {
  const info = kByteCodec.coerceByKey(key);
  if (!info) {
    throw new Error(`Unsupported codec: ${key} (expected one of ${kByteCodec.keys.join(", ")})`);
  }
  return byteCodecs[info.key];
}

export function allByteCodecs(): ByteCodec[] {
  return kByteCodec.keys.map((k) => byteCodecs[k]);
}

/** ---- file data formats ---- */

export const kDataFormat = defineEnum({
  raw: { value: "raw" },
  hex: { value: "hex" },
  base64: { value: "base64" },
} as const);

export type DataFormatKey = typeof kDataFormat.$key;

type DataFormat = {
  fromFile: (data: Uint8Array) => Uint8Array;
  toFile: (data: Uint8Array) => Uint8Array;
};

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8");

const dataFormats: Record<DataFormatKey, DataFormat> = {
  raw: {
    fromFile: (data) => data,
    toFile: (data) => data,
  },
  hex: {
    fromFile: (data) => decodeHexString(textDecoder.decode(data)),
    toFile: (data) => textEncoder.encode(`${encodeHexString(data)}\n`),
  },
  base64: {
    fromFile: (data) => Uint8Array.from(Buffer.from(textDecoder.decode(data).trim(), "base64")),
    toFile: (data) => textEncoder.encode(`${Buffer.from(data).toString("base64")}\n`),
  },
};

export function resolveDataFormat(format: string): DataFormatKey {
  const info = kDataFormat.coerceByKey(format);
  if (!info) {
    throw new Error(`Unsupported data format: ${format} (expected one of ${kDataFormat.keys.join(", ")})`);
  }
  return info.key;
}

export function readDataFormat(format: DataFormatKey, fileData: Uint8Array): Uint8Array {
  return dataFormats[format].fromFile(fileData);
}

export function writeDataFormat(format: DataFormatKey, data: Uint8Array): Uint8Array {
  return dataFormats[format].toFile(data);
}
