export interface RawExportFile {
  fileName: string;
  size: number;
  modifiedAt: string;
  rows: number;
  columns: string[];
  readable: boolean;
  error?: string;
}

export interface RawExportSourcePort {
  list(): Promise<RawExportFile[]>;
  read(fileName: string): Promise<string>;
}
