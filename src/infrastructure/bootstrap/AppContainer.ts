import { DatasetStorePort } from '../../application/ports/DatasetStorePort.js';
import { ExportParserPort } from '../../application/ports/ExportParserPort.js';
import { RawExportSourcePort } from '../../application/ports/RawExportSourcePort.js';
import { TaggingConfigPort } from '../../application/ports/TaggingConfigPort.js';
import { ImportService } from '../../application/services/ImportService.js';
import { ReportService } from '../../application/services/ReportService.js';
import { TaggingConfigSession } from '../../application/services/TaggingConfigSession.js';
import { TaggingService } from '../../application/services/TaggingService.js';
import { JsonTaggingConfigStore } from '../adapters/config/JsonTaggingConfigStore.js';
import { CsvExportParser } from '../adapters/parser/CsvExportParser.js';
import { FileSystemRawExportSource } from '../adapters/raw/FileSystemRawExportSource.js';
import { CsvDatasetStore } from '../adapters/storage/CsvDatasetStore.js';
import { AppConfig, loadConfig } from '../config/Config.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  parser?: ExportParserPort;
  datasetStore?: DatasetStorePort;
  taggingConfigStore?: TaggingConfigPort;
  rawSource?: RawExportSourcePort;
}

export class AppContainer {
  readonly config: AppConfig;

  readonly parser: ExportParserPort;
  readonly datasetStore: DatasetStorePort;
  readonly taggingConfigStore: TaggingConfigPort;
  readonly rawSource: RawExportSourcePort;
  readonly taggingConfig: TaggingConfigSession;
  readonly importService: ImportService;
  readonly taggingService: TaggingService;
  readonly reportService: ReportService;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    const { storage } = this.config;

    this.parser = overrides.parser ?? new CsvExportParser();
    this.datasetStore = overrides.datasetStore ?? new CsvDatasetStore(storage.processedFile);
    this.taggingConfigStore = overrides.taggingConfigStore ?? new JsonTaggingConfigStore(storage.configDir);
    this.rawSource = overrides.rawSource ?? new FileSystemRawExportSource(storage.rawDir);

    this.taggingConfig = new TaggingConfigSession(this.taggingConfigStore);
    this.importService = new ImportService(
      this.parser,
      this.datasetStore,
      this.rawSource,
      this.taggingConfig,
      this.config.import,
    );
    this.taggingService = new TaggingService(this.datasetStore, this.taggingConfig);
    this.reportService = new ReportService(this.datasetStore);
  }
}
