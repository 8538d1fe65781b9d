// Frequent byte values, referenced by index from common-value records.
// Changing the contents or order is a wire-format change: bump kCommonValueTableVersion.

export const kCommonValueTableVersion = 1;

export const kCommonValues: readonly number[] = Object.freeze([0x00, 0x01, 0x02, 0x03, 0x04, 0xff, 0x7f, 0x20]);

export function commonValueIndex(value: number): number | undefined {
  const index = kCommonValues.indexOf(value);
  return index === -1 ? undefined : index;
}

export function commonValueAt(index: number): number | undefined {
  return kCommonValues[index];
}
