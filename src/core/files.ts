import fs from "node:fs";
import path from "node:path";

/** Writes through a `.part` file so a crash never leaves a truncated file behind. */
export function writeFileAtomic(filePath: string, content: Buffer | string): void {
  const tempPath = `${filePath}.part`;
  try {
    fs.writeFileSync(tempPath, content);
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    if (fs.existsSync(tempPath)) {
      fs.unlinkSync(tempPath);
    }
    throw error;
  }
}

export function writeJsonAtomic(filePath: string, value: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  writeFileAtomic(filePath, `${JSON.stringify(value, null, 2)}\n`);
}

/** Reads and parses a JSON file; `undefined` when the file does not exist. */
export function readJsonIfExists(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    return undefined;
  }
  return JSON.parse(fs.readFileSync(filePath, "utf-8"));
}
