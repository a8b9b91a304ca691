export { default as RfmService } from "./service";
export { buildRfmReport } from "./service";
export type { ProfileRow, RecordRow, SummaryRow, ReportOptions } from "./service";
export { SEGMENT_LABELS, SEGMENT_TABLE } from "./config";
export { aggregateCustomerOrders } from "./lib/order-aggregator";
export { computeRecency } from "./lib/recency";
export {
  computeRfmScores,
  quantileBreakpoints,
  scoreAscending,
  scoreRecency
} from "./lib/metrics-calculator";
export { buildRfmCode, classifySegment } from "./lib/segment-classifier";
export { paretoOrder, summarizeSegments } from "./lib/segment-summary";
export * from "./lib/types";
