export function TryParseInt(value: unknown): number | null {
  if (typeof value === "number" && isFinite(value)) {
    return Math.floor(value);
  }
  if (typeof value === "string" && /^\s*-?\d+\s*$/.test(value)) {
    return parseInt(value, 10);
  }
  return null;
}

export const formatBytes = (n: number | null) => {
  if (n == null) return "...";
  if (n < 1024) return `${n} B`;
  if (n < 1024 * 1024) return `${(n / 1024).toFixed(1)} KB`;
  return `${(n / (1024 * 1024)).toFixed(2)} MB`;
};

// percentage of the original size saved; negative when the output grew.
export function savedPercent(originalSize: number, compressedSize: number): number {
  if (originalSize === 0) {
    return 0;
  }
  return (1 - compressedSize / originalSize) * 100;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i += 1) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}
