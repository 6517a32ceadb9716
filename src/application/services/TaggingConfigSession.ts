import { TaggingConfig } from '../../domain/entities/VendorAssociation.js';
import { recordTagging } from '../../domain/services/Tagging.js';
import { TaggingConfigPort } from '../ports/TaggingConfigPort.js';

/**
 * Holds the tag catalog and vendor association table for one session. Loaded
 * on first use; edits are saved back explicitly through the port.
 */
export class TaggingConfigSession {
  private config: TaggingConfig | null = null;

  constructor(private readonly store: TaggingConfigPort) {}

  async current(): Promise<TaggingConfig> {
    if (!this.config) {
      this.config = await this.store.load();
    }

    return this.config;
  }

  async record(vendorKeys: string[], labels: string[]): Promise<TaggingConfig> {
    const updated = recordTagging(await this.current(), vendorKeys, labels);

    // Only adopt the new table once it is on disk.
    await this.store.save(updated);
    this.config = updated;

    return updated;
  }
}
