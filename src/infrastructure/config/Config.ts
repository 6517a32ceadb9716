import path from 'node:path';
import { ExportColumns } from '../../application/ports/ExportParserPort.js';

export interface AppConfig {
  storage: {
    dataDir: string;
    rawDir: string;
    processedFile: string;
    configDir: string;
  };
  import: {
    columns: ExportColumns;
    delimiter?: string;
    dateFormats?: string[];
    expensesOnly: boolean;
  };
  server: {
    port: number;
  };
}

const listOf = (value: string | undefined): string[] | undefined => {
  const items = value
    ?.split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  return items?.length ? items : undefined;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const dataDir = path.resolve(env.DATA_DIR ?? 'data');

  return {
    storage: {
      dataDir,
      rawDir: path.resolve(env.RAW_DATA_DIR ?? path.join(dataDir, 'raw')),
      processedFile: path.resolve(env.PROCESSED_DATASET_FILE ?? path.join(dataDir, 'processed', 'expenses.csv')),
      configDir: path.resolve(env.TAG_CONFIG_DIR ?? path.join(dataDir, 'config')),
    },
    import: {
      columns: {
        date: env.CSV_DATE_COLUMN ?? 'Started Date',
        description: env.CSV_DESCRIPTION_COLUMN ?? 'Description',
        amount: env.CSV_AMOUNT_COLUMN ?? 'Amount',
        currency: env.CSV_CURRENCY_COLUMN ?? 'Currency',
      },
      delimiter: env.CSV_DELIMITER || undefined,
      dateFormats: listOf(env.CSV_DATE_FORMATS),
      expensesOnly: env.IMPORT_EXPENSES_ONLY === 'true',
    },
    server: {
      port: Number(env.PORT ?? 4000),
    },
  };
};
