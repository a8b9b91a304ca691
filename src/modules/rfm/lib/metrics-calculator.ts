import { QUINTILE_PERCENTS, SEGMENT_TABLE, SegmentTable } from "../config";
import { buildRfmCode, classifySegment } from "./segment-classifier";
import {
  Breakpoints,
  QuintileDistribution,
  RawMetricRecord,
  RfmRecord,
  Score
} from "./types";

export type ComputeResult = {
  records: RfmRecord[];
  distributions: QuintileDistribution | null;
};

type MetricKind = "recency" | "frequency" | "monetary";

export function percentile(sorted: readonly number[], p: number): number {
  if (!sorted.length) {
    return 0;
  }
  if (p <= 0) {
    return sorted[0];
  }
  if (p >= 1) {
    return sorted[sorted.length - 1];
  }
  const index = (sorted.length - 1) * p;
  const lower = Math.floor(index);
  const upper = Math.ceil(index);
  if (lower === upper) {
    return sorted[lower];
  }
  const weight = index - lower;
  return sorted[lower] + (sorted[upper] - sorted[lower]) * weight;
}

export function quantileBreakpoints(values: readonly number[]): Breakpoints {
  const sorted = values.slice().sort((a, b) => a - b);
  const [q20, q40, q60, q80] = QUINTILE_PERCENTS.map((p) =>
    percentile(sorted, p)
  );
  return { q20, q40, q60, q80 };
}

/** Higher value, higher score. Ties on a breakpoint go to the upper bucket. */
export function scoreAscending(value: number, breakpoints: Breakpoints): Score {
  if (value >= breakpoints.q80) {
    return 5;
  }
  if (value >= breakpoints.q60) {
    return 4;
  }
  if (value >= breakpoints.q40) {
    return 3;
  }
  if (value >= breakpoints.q20) {
    return 2;
  }
  return 1;
}

/** More days since the last purchase, lower score. */
export function scoreRecency(value: number, breakpoints: Breakpoints): Score {
  if (value >= breakpoints.q80) {
    return 1;
  }
  if (value >= breakpoints.q60) {
    return 2;
  }
  if (value >= breakpoints.q40) {
    return 3;
  }
  if (value >= breakpoints.q20) {
    return 4;
  }
  return 5;
}

function extractMetric(
  records: readonly RawMetricRecord[],
  kind: MetricKind
): number[] {
  switch (kind) {
    case "recency":
      return records.map((record) => record.recencyDays);
    case "frequency":
      return records.map((record) => record.frequency);
    case "monetary":
      return records.map((record) => record.monetary);
  }
}

export function buildDistribution(
  records: readonly RawMetricRecord[]
): QuintileDistribution | null {
  if (!records.length) {
    return null;
  }
  return {
    recency: quantileBreakpoints(extractMetric(records, "recency")),
    frequency: quantileBreakpoints(extractMetric(records, "frequency")),
    monetary: quantileBreakpoints(extractMetric(records, "monetary"))
  };
}

export function computeRfmScores(
  records: readonly RawMetricRecord[],
  table: SegmentTable = SEGMENT_TABLE
): ComputeResult {
  const distributions = buildDistribution(records);
  if (!distributions) {
    return { records: [], distributions: null };
  }

  const scored = records.map((record): RfmRecord => {
    const recencyScore = scoreRecency(record.recencyDays, distributions.recency);
    const frequencyScore = scoreAscending(
      record.frequency,
      distributions.frequency
    );
    const monetaryScore = scoreAscending(
      record.monetary,
      distributions.monetary
    );
    const rfmCode = buildRfmCode({ recencyScore, frequencyScore, monetaryScore });

    return {
      ...record,
      recencyScore,
      frequencyScore,
      monetaryScore,
      rfmCode,
      segment: classifySegment(rfmCode, table).label
    };
  });

  return { records: scored, distributions };
}
