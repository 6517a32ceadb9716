import {
  CategoryTotal,
  MonthTotal,
  MonthlyPoint,
  MonthlyStats,
  ReportFilter,
  TagTotal,
  categoryTotals,
  categoryTrend,
  monthlySeries,
  monthlyStats,
  periodTotal,
  subtagBreakdown,
} from '../../domain/services/Aggregator.js';
import { DatasetStorePort } from '../ports/DatasetStorePort.js';

export class ReportService {
  constructor(private readonly datasetStore: DatasetStorePort) {}

  async categoryReport(filter: ReportFilter): Promise<{ total: number; categories: CategoryTotal[] }> {
    const dataset = await this.datasetStore.load();

    return {
      total: periodTotal(dataset, filter),
      categories: categoryTotals(dataset, filter),
    };
  }

  async monthlyReport(filter: ReportFilter): Promise<{ series: MonthlyPoint[]; stats: MonthlyStats }> {
    const series = monthlySeries(await this.datasetStore.load(), filter);
    return { series, stats: monthlyStats(series) };
  }

  async subtags(category: string, filter: ReportFilter): Promise<TagTotal[]> {
    return subtagBreakdown(await this.datasetStore.load(), category, filter);
  }

  async categoryTrend(category: string, filter: ReportFilter): Promise<MonthTotal[]> {
    return categoryTrend(await this.datasetStore.load(), category, filter);
  }
}
