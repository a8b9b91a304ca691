import { RfmService, SEGMENT_LABELS } from "../modules/rfm";
import type { DefinedTool } from "../types/tool";
import { defineTool } from "../utils/define-tools";
import { ToolError } from "../utils/error";
import { coerceFilters, filterShape } from "./shared";

const DEFAULT_PAGE_SIZE = 100;
const MAX_PAGE_SIZE = 1000;

function assertKnownSegments(segments: string[] | undefined): string[] {
    const requested = segments ?? [];
    const unknown = requested.filter((label) => !SEGMENT_LABELS.includes(label));
    if (unknown.length) {
        throw new ToolError(
            `Unknown segment(s): ${unknown.join(", ")}`,
            "invalid_segments",
            { unknown, allowed: SEGMENT_LABELS }
        );
    }
    return requested;
}

export function createRfmTools(rfm: RfmService): DefinedTool[] {
    const rfm_segment_summary = defineTool((z) => ({
        name: "rfm_segment_summary",
        description:
            "RFM customer segmentation for the filtered purchases. Returns the per-segment customer count, monetary total, share (%), min-max scaled total and the Pareto ordering with cumulative %. 'segments' restricts the summary to the given labels.",
        inputSchema: {
            ...filterShape(z),
            segments: z.array(z.string().min(1)).optional()
        },
        handler: async (input) => {
            const segments = assertKnownSegments(input.segments);
            const report = await rfm.report(coerceFilters(input), segments);
            return {
                anchor_date: report.anchorDate?.toISOString() ?? null,
                customers: report.records.length,
                breakpoints: report.breakpoints,
                available_segments: report.availableSegments,
                summary: report.summary.map((row) => rfm.toSummaryRow(row)),
                pareto: report.pareto.map((row) => rfm.toSummaryRow(row))
            };
        }
    }));

    const rfm_customers = defineTool((z) => ({
        name: "rfm_customers",
        description:
            "Per-customer RFM records (recency days, frequency, monetary, 1-5 scores, RFM code, segment) for the filtered purchases, paginated. 'segments' keeps only customers in those segments.",
        inputSchema: {
            ...filterShape(z),
            segments: z.array(z.string().min(1)).optional(),
            limit: z.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
            offset: z.number().int().min(0).default(0)
        },
        handler: async (input) => {
            const segments = assertKnownSegments(input.segments);
            const report = await rfm.report(coerceFilters(input));
            const selected = segments.length ? new Set(segments) : null;
            const records = selected
                ? report.records.filter((record) => selected.has(record.segment))
                : report.records;
            return {
                anchor_date: report.anchorDate?.toISOString() ?? null,
                total: records.length,
                limit: input.limit,
                offset: input.offset,
                customers: records
                    .slice(input.offset, input.offset + input.limit)
                    .map((record) => rfm.toRecordRow(record))
            };
        }
    }));

    const customer_order_profiles = defineTool((z) => ({
        name: "customer_order_profiles",
        description:
            "One row per customer with delivered orders in the filtered purchases: last purchase date, distinct orders and total monetary value (price + freight), paginated.",
        inputSchema: {
            ...filterShape(z),
            limit: z.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
            offset: z.number().int().min(0).default(0)
        },
        handler: async (input) => {
            const report = await rfm.report(coerceFilters(input));
            return {
                total: report.profiles.length,
                limit: input.limit,
                offset: input.offset,
                profiles: report.profiles
                    .slice(input.offset, input.offset + input.limit)
                    .map((profile) => rfm.toProfileRow(profile))
            };
        }
    }));

    const rfm_segment_table = defineTool(() => ({
        name: "rfm_segment_table",
        description:
            "The fixed RFM code -> segment table used for classification, in lookup order, plus the catch-all label.",
        inputSchema: {},
        handler: async () => ({
            segments: rfm.segmentTable.segments.map((segment) => ({
                id: segment.id,
                label: segment.label,
                codes: [...new Set(segment.codes)]
            })),
            fallback: rfm.segmentTable.fallback
        })
    }));

    return [
        rfm_segment_summary,
        rfm_customers,
        customer_order_profiles,
        rfm_segment_table
    ];
}
