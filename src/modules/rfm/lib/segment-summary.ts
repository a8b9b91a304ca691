import { roundTo } from "../../../utils/number";
import { ParetoSegmentSummary, RfmRecord, SegmentSummary } from "./types";

const byLabel = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export function listSegments(records: readonly RfmRecord[]): string[] {
  return [...new Set(records.map((record) => record.segment))].sort(byLabel);
}

/**
 * Groups records by segment. `selection` restricts the summary to the given
 * labels; undefined or empty keeps every segment.
 */
export function summarizeSegments(
  records: readonly RfmRecord[],
  selection?: readonly string[]
): SegmentSummary[] {
  const selected =
    selection && selection.length > 0 ? new Set(selection) : null;

  const groups = new Map<string, { customerCount: number; totalMonetary: number }>();
  for (const record of records) {
    if (selected && !selected.has(record.segment)) {
      continue;
    }
    const group = groups.get(record.segment) ?? {
      customerCount: 0,
      totalMonetary: 0
    };
    group.customerCount += 1;
    group.totalMonetary += record.monetary;
    groups.set(record.segment, group);
  }

  if (!groups.size) {
    return [];
  }

  const totals = [...groups.values()].map((group) => group.totalMonetary);
  const grandTotal = totals.reduce((sum, value) => sum + value, 0);
  const min = Math.min(...totals);
  const max = Math.max(...totals);
  const range = max - min;

  return [...groups.entries()]
    .sort(([a], [b]) => byLabel(a, b))
    .map(([segment, group]) => ({
      segment,
      customerCount: group.customerCount,
      totalMonetary: group.totalMonetary,
      totalMonetaryPercent:
        grandTotal === 0
          ? 0
          : roundTo((group.totalMonetary / grandTotal) * 100, 2),
      totalMonetaryScaled:
        range === 0 ? 0 : (group.totalMonetary - min) / range
    }));
}

/**
 * Orders segments by monetary total (largest first) and attaches the running
 * share of the grand total, computed from unrounded shares.
 */
export function paretoOrder(
  summary: readonly SegmentSummary[]
): ParetoSegmentSummary[] {
  const grandTotal = summary.reduce((sum, row) => sum + row.totalMonetary, 0);
  const sorted = summary
    .slice()
    .sort(
      (a, b) =>
        b.totalMonetary - a.totalMonetary || byLabel(a.segment, b.segment)
    );

  let running = 0;
  return sorted.map((row) => {
    running += row.totalMonetary;
    return {
      ...row,
      cumulativePercent: grandTotal === 0 ? 0 : (running / grandTotal) * 100
    };
  });
}
