export { kCommonValues, kCommonValueTableVersion } from "./commonValues";
export { decode, decodeInto, describeRecord, inspect, tryDecode } from "./decoder";
export type { DecodeOptions } from "./decoder";
export {
  countNibbles,
  countRun,
  countZeroRun,
  detectDeltaSequence,
  detectNibbleRun,
  detectRun,
  detectZeroRun,
  findPattern,
  measureDeltaSequence,
} from "./detectors";
export type { DeltaSequence, PatternMatch } from "./detectors";
export { encode, encodeInto, planRecords, tryEncode } from "./encoder";
export type { EncodeOptions } from "./encoder";
export { CodecError } from "./errors";
export type { CodecErrorKind } from "./errors";
export type { CodecRecord, CodecRecordKind, ParsedRecord } from "./records";
export { selectRecord, shouldEndLiteral } from "./strategy";
