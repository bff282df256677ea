import fs from "node:fs";
import path from "node:path";
import type { LogRecord, MergedOutput } from "../types";

export const MERGED_EXTENSION = ".geojson";

/** `name.geojson`, then `name_1.geojson`, `name_2.geojson`, … until one is free. */
export async function nextAvailablePath(dir: string, name: string, extension = MERGED_EXTENSION): Promise<string> {
  for (let sequence = 0; ; sequence += 1) {
    const candidate = path.join(dir, sequence === 0 ? `${name}${extension}` : `${name}_${sequence}${extension}`);
    try {
      await fs.promises.access(candidate);
    } catch {
      return candidate;
    }
  }
}

export async function writeMergedOutput(
  output: MergedOutput,
  dir: string,
  name: string,
  extension = MERGED_EXTENSION,
): Promise<string> {
  await fs.promises.mkdir(dir, { recursive: true });
  const content = JSON.stringify(output, null, 2);
  for (;;) {
    const filePath = await nextAvailablePath(dir, name, extension);
    try {
      await fs.promises.writeFile(filePath, content, { encoding: "utf-8", flag: "wx" });
      return filePath;
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "EEXIST") {
        continue;
      }
      throw error;
    }
  }
}

export async function writeLogJsonl(records: LogRecord[], filePath: string): Promise<void> {
  if (records.length === 0) {
    return;
  }

  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const content = records.map((record) => JSON.stringify(record)).join("\n") + "\n";
  await fs.promises.appendFile(filePath, content, "utf-8");
}
