import fs from "node:fs/promises";
import path from "node:path";

/**
 * Write a response body for offline inspection. Same name each time, so the
 * latest failure replaces the previous one.
 */
export async function dumpHtml(dir: string, fileName: string, html: string): Promise<string> {
  await fs.mkdir(dir, { recursive: true });
  const target = path.join(dir, fileName);
  await fs.writeFile(target, html, "utf8");
  return target;
}
