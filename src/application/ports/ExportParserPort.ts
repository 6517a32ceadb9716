import { ParsedExportDTO } from '../dto/ParsedExportDTO.js';

export interface ExportColumns {
  date: string;
  description: string;
  amount: string;
  currency: string;
}

export interface ExportParseOptions {
  columns: ExportColumns;
  delimiter?: string;
  dateFormats?: string[];
  expensesOnly?: boolean;
}

export interface ExportParserPort {
  parse(content: string, options: ExportParseOptions): Promise<ParsedExportDTO>;
}
