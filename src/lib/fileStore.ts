import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { getErrorMessage, isErrnoException, StorageError } from "./errors.js";

const writeLocks = new Map<string, Promise<void>>();

const withWriteLock = async <T>(filePath: string, task: () => Promise<T>): Promise<T> => {
  const current = writeLocks.get(filePath) ?? Promise.resolve();

  let release!: () => void;
  const next = new Promise<void>((resolve) => {
    release = resolve;
  });

  const queued = current.then(() => next);
  writeLocks.set(filePath, queued);
  await current;

  try {
    return await task();
  } finally {
    release();
    if (writeLocks.get(filePath) === queued) {
      writeLocks.delete(filePath);
    }
  }
};

const storageFailure = (action: string, filePath: string, error: unknown): StorageError =>
  new StorageError(`${action} failed for ${filePath}: ${getErrorMessage(error)}`, { cause: error });

const isMissing = (error: unknown): boolean => isErrnoException(error) && error.code === "ENOENT";

export const ensureDir = async (dirPath: string): Promise<void> => {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (error) {
    throw storageFailure("mkdir", dirPath, error);
  }
};

export const pathExists = async (filePath: string): Promise<boolean> => {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
};

export const ensureFile = async (filePath: string, defaultContent: string): Promise<void> => {
  if (await pathExists(filePath)) return;
  await ensureDir(path.dirname(filePath));
  try {
    await fs.writeFile(filePath, defaultContent, { encoding: "utf8", flag: "wx" });
  } catch (error) {
    if (isErrnoException(error) && error.code === "EEXIST") return;
    throw storageFailure("create", filePath, error);
  }
};

/** Resolves to `null` when the file does not exist. */
export const readTextFile = async (filePath: string): Promise<string | null> => {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (isMissing(error)) return null;
    throw storageFailure("read", filePath, error);
  }
};

export const writeTextFile = async (filePath: string, content: string): Promise<void> => {
  await ensureDir(path.dirname(filePath));

  await withWriteLock(filePath, async () => {
    const tempFile = `${filePath}.${randomUUID()}.tmp`;
    try {
      await fs.writeFile(tempFile, content, "utf8");
      await fs.rename(tempFile, filePath);
    } catch (error) {
      await fs.rm(tempFile, { force: true });
      throw storageFailure("write", filePath, error);
    }
  });
};

export const writeJsonFile = async <T>(filePath: string, data: T): Promise<void> => {
  await writeTextFile(filePath, `${JSON.stringify(data, null, 2)}\n`);
};

export const renameFile = async (from: string, to: string): Promise<void> => {
  try {
    await fs.rename(from, to);
  } catch (error) {
    throw storageFailure("rename", from, error);
  }
};

/** Resolves to `false` when there was nothing to remove. */
export const removeFile = async (filePath: string): Promise<boolean> => {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (error) {
    if (isMissing(error)) return false;
    throw storageFailure("unlink", filePath, error);
  }
};

export const listFilesRecursive = async (rootDir: string, extension: string): Promise<string[]> => {
  const files: string[] = [];
  const queue = [rootDir];

  while (queue.length > 0) {
    const current = queue.pop();
    if (!current) continue;

    let entries: Array<{ name: string; isDirectory: () => boolean; isFile: () => boolean }>;
    try {
      entries = await fs.readdir(current, { withFileTypes: true, encoding: "utf8" });
    } catch (error) {
      if (isMissing(error)) continue;
      throw storageFailure("readdir", current, error);
    }

    for (const entry of entries) {
      const fullPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        queue.push(fullPath);
        continue;
      }

      if (!entry.isFile() || !entry.name.endsWith(extension)) continue;
      files.push(fullPath);
    }
  }

  return files;
};

/**
 * True when `target` lies strictly below `root` once both are resolved to
 * absolute paths. `/wiki2/x` is not inside `/wiki`.
 */
export const isPathInside = (root: string, target: string): boolean => {
  const relative = path.relative(path.resolve(root), path.resolve(target));
  if (relative === "" || path.isAbsolute(relative)) return false;
  return relative !== ".." && !relative.startsWith(`..${path.sep}`);
};
