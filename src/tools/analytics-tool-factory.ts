import type { AnalyticsService } from "../services/analytics-service";
import type { DefinedTool } from "../types/tool";
import { defineTool } from "../utils/define-tools";
import { coerceFilters, filterShape } from "./shared";

export function createAnalyticsTools(analytics: AnalyticsService): DefinedTool[] {
    const filter_options = defineTool((z) => ({
        name: "filter_options",
        description:
            "List the purchase-date bounds, customer states and cities available for filtering. Pass 'states' to narrow the city list.",
        inputSchema: {
            states: z.array(z.string().min(1)).optional()
        },
        handler: async (input) => {
            const options = await analytics.filterOptions(input.states);
            return {
                min_date: options.minDate,
                max_date: options.maxDate,
                states: options.states,
                cities: options.cities
            };
        }
    }));

    const order_status_distribution = defineTool((z) => ({
        name: "order_status_distribution",
        description:
            "Count orders per status (delivered, shipped, canceled, ...) for the filtered purchases. Returns rows { status, total } largest first.",
        inputSchema: filterShape(z),
        handler: async (input) => {
            const rows = await analytics.orderStatusDistribution(coerceFilters(input));
            return { rows };
        }
    }));

    const orders_over_time = defineTool((z) => ({
        name: "orders_over_time",
        description:
            "Order volume per period. Granularity: daily (YYYY-MM-DD), weekly (Monday/Sunday span) or monthly (YYYY-MM).",
        inputSchema: {
            ...filterShape(z),
            granularity: z.enum(["daily", "weekly", "monthly"]).default("daily")
        },
        handler: async (input) => {
            const rows = await analytics.ordersOverTime(
                coerceFilters(input),
                input.granularity
            );
            return { granularity: input.granularity, rows };
        }
    }));

    const payment_type_distribution = defineTool((z) => ({
        name: "payment_type_distribution",
        description:
            "Count payment records per payment method (credit_card, boleto, voucher, debit_card) for the filtered orders.",
        inputSchema: filterShape(z),
        handler: async (input) => {
            const rows = await analytics.paymentTypeDistribution(coerceFilters(input));
            return {
                rows: rows.map((row) => ({
                    payment_type: row.paymentType,
                    total: row.total
                }))
            };
        }
    }));

    const review_score_distribution = defineTool((z) => ({
        name: "review_score_distribution",
        description:
            "Count reviews per score (1-5) for the filtered orders, ordered by score.",
        inputSchema: filterShape(z),
        handler: async (input) => {
            const rows = await analytics.reviewScoreDistribution(coerceFilters(input));
            return { rows };
        }
    }));

    const top_product_categories = defineTool((z) => ({
        name: "top_product_categories",
        description:
            "Top product categories by number of items sold in the filtered orders. limit: 5-50 (default 15).",
        inputSchema: {
            ...filterShape(z),
            limit: z.number().int().min(5).max(50).optional()
        },
        handler: async (input) => {
            const rows = await analytics.topProductCategories(
                coerceFilters(input),
                input.limit
            );
            return { rows };
        }
    }));

    const top_sellers = defineTool((z) => ({
        name: "top_sellers",
        description:
            "Top sellers by number of items sold in the filtered orders. limit: 5-50 (default 15).",
        inputSchema: {
            ...filterShape(z),
            limit: z.number().int().min(5).max(50).optional()
        },
        handler: async (input) => {
            const rows = await analytics.topSellers(coerceFilters(input), input.limit);
            return {
                rows: rows.map((row) => ({ seller_id: row.sellerId, total: row.total }))
            };
        }
    }));

    const top_locations = defineTool((z) => ({
        name: "top_locations",
        description:
            "Top customer cities by delivered orders, with GMV (price + freight) and coordinates. limit: 5-50 (default 10).",
        inputSchema: {
            ...filterShape(z),
            limit: z.number().int().min(5).max(50).optional()
        },
        handler: async (input) => {
            const rows = await analytics.topLocations(coerceFilters(input), input.limit);
            return {
                rows: rows.map((row) => ({
                    location: row.location,
                    city: row.city,
                    state: row.state,
                    lat: row.lat,
                    lng: row.lng,
                    orders_count: row.ordersCount,
                    total_value: row.totalValue
                }))
            };
        }
    }));

    return [
        filter_options,
        order_status_distribution,
        orders_over_time,
        payment_type_distribution,
        review_score_distribution,
        top_product_categories,
        top_sellers,
        top_locations
    ];
}
