import { TaggingConfig } from '../../domain/entities/VendorAssociation.js';

export interface TaggingConfigPort {
  load(): Promise<TaggingConfig>;
  save(config: TaggingConfig): Promise<void>;
}
