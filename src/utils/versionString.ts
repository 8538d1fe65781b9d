import { version } from "../../package.json";

export function getVersionTag(): string {
  return `v${version}`;
}

// Example: "bytepack v0.1.0 (wire format 1)"
export function getAppVersionString(tableVersion: number): string {
  return `bytepack ${getVersionTag()} (wire format ${tableVersion})`;
}
