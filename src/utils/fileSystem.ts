import * as fs from "fs";
import * as path from "path";

export function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

export async function readBinaryFileAsync(filePath: string): Promise<Uint8Array> {
  const data = await fs.promises.readFile(filePath);
  return new Uint8Array(data);
}

export async function writeBinaryFile(filePath: string, data: Uint8Array): Promise<void> {
  ensureDir(path.dirname(path.resolve(filePath)));
  await fs.promises.writeFile(filePath, Buffer.from(data));
}
