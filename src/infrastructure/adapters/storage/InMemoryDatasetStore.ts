import { DatasetStorePort } from '../../../application/ports/DatasetStorePort.js';
import { Dataset } from '../../../domain/entities/Transaction.js';

export class InMemoryDatasetStore implements DatasetStorePort {
  private dataset: Dataset;
  saves = 0;

  constructor(initial: Dataset = []) {
    this.dataset = initial.map((txn) => ({ ...txn, tags: [...txn.tags] }));
  }

  async load(): Promise<Dataset> {
    return this.dataset.map((txn) => ({ ...txn, tags: [...txn.tags] }));
  }

  async save(dataset: Dataset): Promise<void> {
    this.dataset = dataset.map((txn) => ({ ...txn, tags: [...txn.tags] }));
    this.saves += 1;
  }
}
