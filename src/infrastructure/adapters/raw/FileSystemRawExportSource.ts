import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import Papa from 'papaparse';
import { RawExportFile, RawExportSourcePort } from '../../../application/ports/RawExportSourcePort.js';
import { StorageIOError } from '../../../domain/errors/PipelineErrors.js';
import { isMissingFile, readTextFile } from '../../fs/files.js';

export class FileSystemRawExportSource implements RawExportSourcePort {
  constructor(private readonly rawDir: string) {}

  async list(): Promise<RawExportFile[]> {
    let names: string[];

    try {
      names = await readdir(this.rawDir);
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }

      throw new StorageIOError(`Unable to list ${this.rawDir}`, this.rawDir, false, { cause: error });
    }

    const files = await Promise.all(
      names.filter((name) => name.toLowerCase().endsWith('.csv')).map((name) => this.describe(name)),
    );

    return files.sort((a, b) => b.modifiedAt.localeCompare(a.modifiedAt) || a.fileName.localeCompare(b.fileName));
  }

  async read(fileName: string): Promise<string> {
    return readTextFile(this.resolve(fileName));
  }

  private resolve(fileName: string): string {
    if (path.basename(fileName) !== fileName) {
      throw new StorageIOError(`Invalid export file name: ${fileName}`, fileName, true);
    }

    return path.join(this.rawDir, fileName);
  }

  private async describe(fileName: string): Promise<RawExportFile> {
    const filePath = this.resolve(fileName);
    const info = await stat(filePath);
    const base = { fileName, size: info.size, modifiedAt: info.mtime.toISOString() };

    try {
      const result = Papa.parse<Record<string, string>>(await readTextFile(filePath), {
        header: true,
        skipEmptyLines: 'greedy',
        transformHeader: (header) => header.trim(),
      });

      return { ...base, rows: result.data.length, columns: result.meta.fields ?? [], readable: true };
    } catch (error) {
      return {
        ...base,
        rows: 0,
        columns: [],
        readable: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }
}
