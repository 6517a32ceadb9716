import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import Papa from 'papaparse';
import {
  DECIMAL_AMOUNT,
  ParsedExportDTO,
  ParsedTransactionDTO,
  SkippedRowDTO,
} from '../../../application/dto/ParsedExportDTO.js';
import { ExportColumns, ExportParseOptions, ExportParserPort } from '../../../application/ports/ExportParserPort.js';
import { ParseError, SchemaError } from '../../../domain/errors/PipelineErrors.js';

dayjs.extend(customParseFormat);

export const DEFAULT_DATE_FORMATS = ['YYYY-MM-DD HH:mm:ss', 'YYYY-MM-DD HH:mm', 'YYYY-MM-DD[T]HH:mm:ss', 'YYYY-MM-DD'];

const byteOrderMark = /^\uFEFF/;
const quoteErrors = new Set(['MissingQuotes', 'InvalidQuotes']);

type CsvRow = Record<string, string | undefined>;

const parseAmount = (raw: string, row: number): number => {
  const compact = raw.replace(/\s/g, '');

  if (!DECIMAL_AMOUNT.test(compact)) {
    throw new ParseError(`amount "${raw}" is not a decimal number`, row);
  }

  return Number(compact);
};

const parseDate = (raw: string, formats: string[], row: number): string => {
  const parsed = raw === '' ? null : dayjs(raw, formats, true);

  if (!parsed || !parsed.isValid()) {
    throw new ParseError(`date "${raw}" does not match ${formats.join(' | ')}`, row);
  }

  return parsed.format('YYYY-MM-DD');
};

export class CsvExportParser implements ExportParserPort {
  async parse(content: string, options: ExportParseOptions): Promise<ParsedExportDTO> {
    const result = Papa.parse<CsvRow>(content.replace(byteOrderMark, ''), {
      header: true,
      skipEmptyLines: 'greedy',
      delimiter: options.delimiter ?? '',
      transformHeader: (header) => header.trim(),
    });

    const columns = result.meta.fields ?? [];
    this.assertColumns(columns, options.columns);

    const brokenRows = new Map<number, string>();
    result.errors.forEach((error) => {
      if (error.row !== undefined && quoteErrors.has(error.code)) {
        brokenRows.set(error.row, error.message);
      }
    });

    const formats = options.dateFormats?.length ? options.dateFormats : DEFAULT_DATE_FORMATS;
    const transactions: ParsedTransactionDTO[] = [];
    const skipped: SkippedRowDTO[] = [];
    let filtered = 0;

    result.data.forEach((record, index) => {
      const row = index + 1;

      try {
        const broken = brokenRows.get(index);
        if (broken) {
          throw new ParseError(broken, row);
        }

        const transaction = this.parseRow(record, options.columns, formats, row);

        if (options.expensesOnly && transaction.amount >= 0) {
          filtered += 1;
          return;
        }

        transactions.push(transaction);
      } catch (error) {
        if (!(error instanceof ParseError)) {
          throw error;
        }

        console.warn(`⚠️ Skipping row ${row}: ${error.message}`);
        skipped.push({ row, reason: error.message });
      }
    });

    transactions.sort((a, b) => a.date.localeCompare(b.date));

    return {
      transactions,
      totalRows: result.data.length,
      skipped,
      filtered,
      columns,
    };
  }

  private assertColumns(present: string[], columns: ExportColumns): void {
    const available = new Set(present);
    const missing = Object.values(columns).filter((column) => !available.has(column));

    if (missing.length > 0) {
      throw new SchemaError(`Export is missing required column(s): ${missing.join(', ')}`, missing);
    }
  }

  private parseRow(record: CsvRow, columns: ExportColumns, formats: string[], row: number): ParsedTransactionDTO {
    const rawVendorText = record[columns.description] ?? '';
    const description = rawVendorText.trim();
    const currency = (record[columns.currency] ?? '').trim().toUpperCase();

    if (!description) {
      throw new ParseError('description is empty', row);
    }

    if (!currency) {
      throw new ParseError('currency is empty', row);
    }

    return {
      date: parseDate((record[columns.date] ?? '').trim(), formats, row),
      description,
      amount: parseAmount((record[columns.amount] ?? '').trim(), row),
      currency,
      rawVendorText,
    };
  }
}
