import { promises as fs } from "node:fs";
import { dirname } from "node:path";
import { reportLogger } from "../logger.js";

export async function writeReport(path: string, markdown: string): Promise<void> {
  await fs.mkdir(dirname(path), { recursive: true });
  await fs.writeFile(path, markdown, "utf8");
  reportLogger.debug({ path, bytes: Buffer.byteLength(markdown, "utf8") }, "Saved report");
}
