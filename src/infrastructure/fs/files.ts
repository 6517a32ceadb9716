import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { StorageIOError } from '../../domain/errors/PipelineErrors.js';

const errorCode = (error: unknown): string | undefined => {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }

  return undefined;
};

export const isMissingFile = (error: unknown): boolean => errorCode(error) === 'ENOENT';

export const readTextFile = async (filePath: string): Promise<string> => {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    const missing = isMissingFile(error);
    throw new StorageIOError(
      missing ? `File not found: ${filePath}` : `Unable to read ${filePath}`,
      filePath,
      missing,
      { cause: error },
    );
  }
};

/** Resolves to null when the file does not exist. */
export const readTextFileIfExists = async (filePath: string): Promise<string | null> => {
  try {
    return await readTextFile(filePath);
  } catch (error) {
    if (error instanceof StorageIOError && error.missing) {
      return null;
    }

    throw error;
  }
};

/**
 * Writes beside the target and renames over it, so a failed write leaves the
 * previous file in place.
 */
export const writeFileAtomic = async (filePath: string, content: string): Promise<void> => {
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(tempPath, content, 'utf8');
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new StorageIOError(`Unable to write ${filePath}`, filePath, false, { cause: error });
  }
};
