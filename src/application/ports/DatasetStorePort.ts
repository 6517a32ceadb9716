import { Dataset } from '../../domain/entities/Transaction.js';

export interface DatasetStorePort {
  /** Resolves to an empty dataset when nothing has been persisted yet. */
  load(): Promise<Dataset>;
  save(dataset: Dataset): Promise<void>;
}
