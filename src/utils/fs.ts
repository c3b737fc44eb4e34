import { mkdir, rename, rm, writeFile } from "fs/promises";
import * as path from "path";

/** File name for a session id: reversible, and never a path separator or a bare "..". */
export function sessionFileName(sessionId: string, ext: string): string {
  return `${encodeURIComponent(sessionId)}${ext}`;
}

/** Write via a temp file and rename, so readers see the old document or the new one, never half of it. */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  try {
    await writeFile(tmp, content, "utf8");
    await rename(tmp, filePath);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}
