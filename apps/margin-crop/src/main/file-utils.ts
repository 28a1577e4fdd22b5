import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";
import os from "node:os";

/** Writes beside the target and renames, so readers never see a partial file. */
export const writeFileAtomic = async (filePath: string, data: string | Uint8Array): Promise<void> => {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${crypto.randomUUID()}.tmp`);
  try {
    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
};

export const writeJsonAtomic = async (filePath: string, payload: unknown): Promise<void> =>
  writeFileAtomic(filePath, `${JSON.stringify(payload, null, 2)}\n`);

export const withTempDir = async <T>(prefix: string, task: (dir: string) => Promise<T>): Promise<T> => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  try {
    return await task(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
};
