import { appendFile, readFile, writeFile } from "node:fs/promises";
import type { RcAppendMode } from "../types/config.js";
import { isErrno } from "../host/ownership.js";

export const MANAGED_BLOCK_START = "# >>> host-postinstall >>>";
export const MANAGED_BLOCK_END = "# <<< host-postinstall <<<";

/**
 * Wrap content in the managed markers, or swap it in for an existing managed block.
 * Text outside the markers is left as it was.
 */
export function upsertManagedBlock(existing: string, content: string): string {
  const body = content.endsWith("\n") ? content : `${content}\n`;
  const block = `${MANAGED_BLOCK_START}\n${body}${MANAGED_BLOCK_END}\n`;

  const start = existing.indexOf(MANAGED_BLOCK_START);
  const end = start >= 0 ? existing.indexOf(MANAGED_BLOCK_END, start) : -1;
  if (start >= 0 && end >= 0) {
    let after = end + MANAGED_BLOCK_END.length;
    if (existing[after] === "\n") after += 1;
    return existing.slice(0, start) + block + existing.slice(after);
  }

  const separator = existing === "" || existing.endsWith("\n") ? "" : "\n";
  return existing + separator + block;
}

/**
 * Land an overlay in an rc file, creating the file if needed.
 *
 * "append" adds the bytes as-is on every run, so running twice duplicates them.
 * "managed" keeps a single marker-delimited block that later runs replace.
 */
export async function applyRcOverlay(dest: string, content: Buffer, mode: RcAppendMode): Promise<void> {
  if (mode === "append") {
    await appendFile(dest, content);
    return;
  }
  await writeFile(dest, upsertManagedBlock(await readOrEmpty(dest), content.toString("utf-8")));
}

async function readOrEmpty(path: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    if (isErrno(err, "ENOENT")) return "";
    throw err;
  }
}
