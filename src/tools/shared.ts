import type { z } from "zod";
import type { DashboardFilters } from "../types/dataset";

export type FilterInput = {
    start?: string;
    end?: string;
    start_date?: string;
    end_date?: string;
    from?: string;
    to?: string;
    states?: string[];
    cities?: string[];
};

export function filterShape(zod: typeof z) {
    const day = zod
        .string()
        .describe("Calendar date, YYYY-MM-DD (inclusive)");
    return {
        start: day.optional(),
        end: day.optional(),
        start_date: day.optional(),
        end_date: day.optional(),
        from: day.optional(),
        to: day.optional(),
        states: zod
            .array(zod.string().min(1))
            .optional()
            .describe("Customer states, e.g. ['SP', 'RJ']; empty means all"),
        cities: zod
            .array(zod.string().min(1))
            .optional()
            .describe("Customer cities as spelled in the dataset; empty means all")
    };
}

// alias coercion: (start,end), (start_date,end_date) and (from,to) are accepted
export function coerceFilters(input: FilterInput): DashboardFilters {
    const filters: DashboardFilters = {};
    const startDate = input.start || input.start_date || input.from;
    const endDate = input.end || input.end_date || input.to;
    if (startDate) {
        filters.startDate = startDate;
    }
    if (endDate) {
        filters.endDate = endDate;
    }
    if (input.states?.length) {
        filters.states = input.states;
    }
    if (input.cities?.length) {
        filters.cities = input.cities;
    }
    return filters;
}
