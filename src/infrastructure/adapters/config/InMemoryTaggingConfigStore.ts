import { TaggingConfigPort } from '../../../application/ports/TaggingConfigPort.js';
import { TaggingConfig, emptyTaggingConfig } from '../../../domain/entities/VendorAssociation.js';

const copy = (config: TaggingConfig): TaggingConfig => ({
  tags: { ...config.tags },
  vendorTags: Object.fromEntries(Object.entries(config.vendorTags).map(([vendor, labels]) => [vendor, { ...labels }])),
  mainCategories: [...config.mainCategories],
});

export class InMemoryTaggingConfigStore implements TaggingConfigPort {
  private config: TaggingConfig;
  loads = 0;

  constructor(initial: TaggingConfig = emptyTaggingConfig()) {
    this.config = copy(initial);
  }

  async load(): Promise<TaggingConfig> {
    this.loads += 1;
    return copy(this.config);
  }

  async save(config: TaggingConfig): Promise<void> {
    this.config = copy(config);
  }
}
