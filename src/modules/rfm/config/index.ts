import { z } from "zod";
import rawSegments from "./segments.json";

const RFM_CODE_PATTERN = /^[1-5]{3}$/;

const segmentSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  codes: z
    .array(
      z.string().regex(RFM_CODE_PATTERN, "codes are three digits from 1 to 5")
    )
    .min(1)
});

const segmentsFileSchema = z
  .object({
    fallback: z.object({
      id: z.string().min(1),
      label: z.string().min(1)
    }),
    segments: z.array(segmentSchema).min(1)
  })
  .superRefine((file, ctx) => {
    const owners = new Map<string, string>();
    file.segments.forEach((segment, index) => {
      for (const code of segment.codes) {
        const owner = owners.get(code);
        if (owner !== undefined && owner !== segment.id) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `code ${code} is listed under both ${owner} and ${segment.id}`,
            path: ["segments", index, "codes"]
          });
        }
        owners.set(code, segment.id);
      }
    });
  });

export type SegmentDefinition = z.infer<typeof segmentSchema>;

export type SegmentTable = {
  /** Segments in lookup order; the first one listing a code wins. */
  segments: SegmentDefinition[];
  fallback: Omit<SegmentDefinition, "codes">;
  /** Code -> owning segment; duplicate listings collapse to one entry. */
  lookup: Map<string, SegmentDefinition>;
};

export function parseSegmentTable(raw: unknown): SegmentTable {
  const parsed = segmentsFileSchema.parse(raw);
  const lookup = new Map<string, SegmentDefinition>();
  for (const segment of parsed.segments) {
    for (const code of segment.codes) {
      if (!lookup.has(code)) {
        lookup.set(code, segment);
      }
    }
  }
  return {
    segments: parsed.segments,
    fallback: parsed.fallback,
    lookup
  };
}

export const SEGMENT_TABLE: SegmentTable = parseSegmentTable(rawSegments);

export const SEGMENT_LABELS: string[] = [
  ...SEGMENT_TABLE.segments.map((segment) => segment.label),
  SEGMENT_TABLE.fallback.label
];

/** Breakpoints used for the five score buckets of every dimension. */
export const QUINTILE_PERCENTS = [0.2, 0.4, 0.6, 0.8] as const;

export const DELIVERED_STATUS = "delivered";

export const DAY_IN_MS = 24 * 60 * 60 * 1000;
