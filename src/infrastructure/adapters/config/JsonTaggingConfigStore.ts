import path from 'node:path';
import { ZodType, ZodTypeDef } from 'zod';
import { MainCategoriesSchema, TagCatalogSchema, VendorTagsFileSchema } from '../../../application/dto/TaggingConfigDTO.js';
import { TaggingConfigPort } from '../../../application/ports/TaggingConfigPort.js';
import { TaggingConfig } from '../../../domain/entities/VendorAssociation.js';
import { StorageIOError } from '../../../domain/errors/PipelineErrors.js';
import { readTextFileIfExists, writeFileAtomic } from '../../fs/files.js';

export const TAGS_FILE = 'tags.json';
export const VENDOR_TAGS_FILE = 'vendor_tags.json';
export const MAIN_CATEGORIES_FILE = 'main_categories.json';

/** The tagging configuration files of one directory. A missing file reads as empty. */
export class JsonTaggingConfigStore implements TaggingConfigPort {
  constructor(private readonly configDir: string) {}

  async load(): Promise<TaggingConfig> {
    const [tags, vendorTags, mainCategories] = await Promise.all([
      this.readJson(TAGS_FILE, TagCatalogSchema, {}),
      this.readJson(VENDOR_TAGS_FILE, VendorTagsFileSchema, {}),
      this.readJson(MAIN_CATEGORIES_FILE, MainCategoriesSchema, []),
    ]);

    return { tags, vendorTags, mainCategories };
  }

  async save(config: TaggingConfig): Promise<void> {
    await writeFileAtomic(this.filePath(TAGS_FILE), `${JSON.stringify(config.tags, null, 2)}\n`);
    await writeFileAtomic(this.filePath(VENDOR_TAGS_FILE), `${JSON.stringify(config.vendorTags, null, 2)}\n`);
    await writeFileAtomic(this.filePath(MAIN_CATEGORIES_FILE), `${JSON.stringify(config.mainCategories, null, 2)}\n`);
  }

  private filePath(fileName: string): string {
    return path.join(this.configDir, fileName);
  }

  private async readJson<T>(fileName: string, schema: ZodType<T, ZodTypeDef, unknown>, empty: T): Promise<T> {
    const filePath = this.filePath(fileName);
    const content = await readTextFileIfExists(filePath);

    if (content === null || content.trim() === '') {
      return empty;
    }

    try {
      return schema.parse(JSON.parse(content));
    } catch (error) {
      throw new StorageIOError(`Invalid configuration file ${filePath}`, filePath, false, { cause: error });
    }
  }
}
