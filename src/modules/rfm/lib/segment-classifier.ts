import { SEGMENT_TABLE, SegmentTable } from "../config";
import { QuintileScores } from "./types";

export type SegmentMatch = {
  id: string;
  label: string;
  fallback: boolean;
};

export function buildRfmCode(scores: QuintileScores): string {
  return `${scores.recencyScore}${scores.frequencyScore}${scores.monetaryScore}`;
}

export function classifySegment(
  rfmCode: string,
  table: SegmentTable = SEGMENT_TABLE
): SegmentMatch {
  const match = table.lookup.get(rfmCode);
  if (match) {
    return { id: match.id, label: match.label, fallback: false };
  }

  return {
    id: table.fallback.id,
    label: table.fallback.label,
    fallback: true
  };
}
