import type { DatasetRepo } from "../../repositories/dataset-repo";
import { ResultCache } from "../../lib/result-cache";
import { normalizeFilters } from "../../services/filters";
import type { DashboardFilters } from "../../types/dataset";
import { logEvent } from "../../utils/log";
import { SEGMENT_TABLE, SegmentTable } from "./config";
import { computeRfmScores } from "./lib/metrics-calculator";
import { aggregateCustomerOrders } from "./lib/order-aggregator";
import { computeRecency } from "./lib/recency";
import {
  listSegments,
  paretoOrder,
  summarizeSegments
} from "./lib/segment-summary";
import {
  CustomerOrderProfile,
  ParetoSegmentSummary,
  RfmOrderInput,
  RfmOrderItemInput,
  RfmRecord,
  RfmReport,
  SegmentSummary
} from "./lib/types";

export type ProfileRow = {
  customer_id: string;
  last_purchase_date: string | null;
  order_count: number;
  total_monetary: number;
};

export type RecordRow = {
  customer_id: string;
  recency_days: number;
  frequency: number;
  monetary: number;
  recency_score: number;
  frequency_score: number;
  monetary_score: number;
  rfm_code: string;
  segment: string;
};

export type SummaryRow = {
  segment: string;
  customer_count: number;
  total_monetary: number;
  total_monetary_percent: number;
  total_monetary_scaled: number;
  cumulative_percent?: number;
};

export type RfmServiceOptions = {
  cacheEnabled: boolean;
  segmentTable: SegmentTable;
};

export type ReportOptions = {
  /** Segment labels to summarize; undefined or empty keeps all. */
  segments?: readonly string[];
  table?: SegmentTable;
};

/**
 * Runs the whole pipeline: aggregate delivered orders, derive recency,
 * score quintiles, classify, summarize. Every stage sees the full output of
 * the previous one and nothing is reused between calls.
 */
export function buildRfmReport(
  orders: readonly RfmOrderInput[],
  items: readonly RfmOrderItemInput[],
  options: ReportOptions = {}
): RfmReport {
  const profiles = aggregateCustomerOrders(orders, items);
  const { anchorDate, records: raw } = computeRecency(profiles);
  const { records, distributions } = computeRfmScores(
    raw,
    options.table ?? SEGMENT_TABLE
  );
  const summary = summarizeSegments(records, options.segments);

  return {
    anchorDate,
    breakpoints: distributions,
    profiles,
    records,
    availableSegments: listSegments(records),
    summary,
    pareto: paretoOrder(summary)
  };
}

class RfmService {
  private readonly options: RfmServiceOptions;
  private readonly reports: ResultCache<RfmReport>;

  constructor(
    private readonly dataset: DatasetRepo,
    options: Partial<RfmServiceOptions> = {}
  ) {
    this.options = {
      cacheEnabled: options.cacheEnabled ?? true,
      segmentTable: options.segmentTable ?? SEGMENT_TABLE
    };
    this.reports = new ResultCache<RfmReport>({
      enabled: this.options.cacheEnabled
    });
  }

  get segmentTable(): SegmentTable {
    return this.options.segmentTable;
  }

  computeReport(
    orders: readonly RfmOrderInput[],
    items: readonly RfmOrderItemInput[],
    segments?: readonly string[]
  ): RfmReport {
    return buildRfmReport(orders, items, {
      segments,
      table: this.options.segmentTable
    });
  }

  async report(
    filters: DashboardFilters = {},
    segments: readonly string[] = []
  ): Promise<RfmReport> {
    const normalized = normalizeFilters(filters);
    const selection = [...new Set(segments)].sort();

    return this.reports.getOrCompute(
      "rfm",
      { filters: normalized, segments: selection },
      async () => {
        const startedAt = Date.now();
        const view = await this.dataset.filtered(normalized);
        const report = this.computeReport(
          view.orders,
          view.orderItems,
          selection
        );
        logEvent("info", "rfm.report_computed", {
          customers: report.records.length,
          segments: report.summary.length,
          duration_ms: Date.now() - startedAt
        });
        return report;
      }
    );
  }

  toProfileRow(profile: CustomerOrderProfile): ProfileRow {
    return {
      customer_id: profile.customerId,
      last_purchase_date: profile.lastPurchaseDate?.toISOString() ?? null,
      order_count: profile.orderCount,
      total_monetary: profile.totalMonetary
    };
  }

  toRecordRow(record: RfmRecord): RecordRow {
    return {
      customer_id: record.customerId,
      recency_days: record.recencyDays,
      frequency: record.frequency,
      monetary: record.monetary,
      recency_score: record.recencyScore,
      frequency_score: record.frequencyScore,
      monetary_score: record.monetaryScore,
      rfm_code: record.rfmCode,
      segment: record.segment
    };
  }

  toSummaryRow(row: SegmentSummary | ParetoSegmentSummary): SummaryRow {
    return {
      segment: row.segment,
      customer_count: row.customerCount,
      total_monetary: row.totalMonetary,
      total_monetary_percent: row.totalMonetaryPercent,
      total_monetary_scaled: row.totalMonetaryScaled,
      ...("cumulativePercent" in row
        ? { cumulative_percent: row.cumulativePercent }
        : {})
    };
  }
}

export default RfmService;
