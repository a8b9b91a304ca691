import { addDays, format, startOfISOWeek } from "date-fns";
import { toZonedTime } from "date-fns-tz";
import { DELIVERED_STATUS } from "../modules/rfm/config";
import type { DatasetRepo } from "../repositories/dataset-repo";
import type { DashboardFilters, Geolocation } from "../types/dataset";
import { clamp } from "../utils/number";
import { FilterOptions, listFilterOptions, toDayKey } from "./filters";

export type Granularity = "daily" | "weekly" | "monthly";

export type CountRow<K extends string, V = string> = { [P in K]: V } & {
    total: number;
};

export type PeriodCount = { period: string; count: number };

export type LocationSales = {
    location: string;
    city: string;
    state: string;
    lat: number;
    lng: number;
    ordersCount: number;
    totalValue: number;
};

export const TOP_N_BOUNDS = { min: 5, max: 50 } as const;
export const DEFAULT_TOP_CATEGORIES = 15;
export const DEFAULT_TOP_SELLERS = 15;
export const DEFAULT_TOP_LOCATIONS = 10;

const UNKNOWN_CATEGORY_LABEL = "Unknown";

const compareKeys = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/** Counts occurrences, largest first, ties by key. */
function countBy<T>(rows: readonly T[], keyOf: (row: T) => string): Array<[string, number]> {
    const counts = new Map<string, number>();
    for (const row of rows) {
        const key = keyOf(row);
        counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    return [...counts.entries()].sort(
        ([keyA, a], [keyB, b]) => b - a || compareKeys(keyA, keyB)
    );
}

export const clampTopN = (limit: number | undefined, fallback: number): number =>
    clamp(Math.round(limit ?? fallback), TOP_N_BOUNDS.min, TOP_N_BOUNDS.max);

export function periodKey(date: Date, granularity: Granularity): string {
    switch (granularity) {
        case "daily":
            return toDayKey(date);
        case "weekly": {
            // Local fields of the zoned copy equal the UTC fields.
            const start = startOfISOWeek(toZonedTime(date, "UTC"));
            return `${format(start, "yyyy-MM-dd")}/${format(addDays(start, 6), "yyyy-MM-dd")}`;
        }
        case "monthly":
            return format(toZonedTime(date, "UTC"), "yyyy-MM");
    }
}

/** "SAO PAULO" -> "Sao Paulo"; letters after any non-letter are capitalized. */
export const toTitleCase = (value: string): string =>
    value
        .toLowerCase()
        .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, before: string, letter: string) =>
            `${before}${letter.toUpperCase()}`
        );

/** First geolocation entry (lowest zip prefix) per city and state. */
export function firstGeolocationByCity(
    geolocation: readonly Geolocation[]
): Map<string, Geolocation> {
    const sorted = geolocation
        .slice()
        .sort(
            (a, b) =>
                Number(a.zipCodePrefix) - Number(b.zipCodePrefix) ||
                compareKeys(a.zipCodePrefix, b.zipCodePrefix)
        );
    const first = new Map<string, Geolocation>();
    for (const entry of sorted) {
        const key = `${entry.city}|${entry.state}`;
        if (!first.has(key)) {
            first.set(key, entry);
        }
    }
    return first;
}

// Filtered views share the loaded geolocation array, so one index per load.
const geolocationIndexes = new WeakMap<readonly Geolocation[], Map<string, Geolocation>>();

export function geolocationIndex(
    geolocation: readonly Geolocation[]
): Map<string, Geolocation> {
    let index = geolocationIndexes.get(geolocation);
    if (!index) {
        index = firstGeolocationByCity(geolocation);
        geolocationIndexes.set(geolocation, index);
    }
    return index;
}

export type AnalyticsService = ReturnType<typeof createAnalyticsService>;

export function createAnalyticsService(dataset: DatasetRepo) {
    async function filterOptions(states?: string[]): Promise<FilterOptions> {
        return listFilterOptions(await dataset.load(), states);
    }

    async function orderStatusDistribution(
        filters: DashboardFilters = {}
    ): Promise<Array<CountRow<"status">>> {
        const { orders } = await dataset.filtered(filters);
        return countBy(orders, (order) => order.orderStatus).map(
            ([status, total]) => ({ status, total })
        );
    }

    async function ordersOverTime(
        filters: DashboardFilters = {},
        granularity: Granularity = "daily"
    ): Promise<PeriodCount[]> {
        const { orders } = await dataset.filtered(filters);
        const counts = new Map<string, number>();
        for (const order of orders) {
            if (!order.orderPurchaseTimestamp) {
                continue;
            }
            const key = periodKey(order.orderPurchaseTimestamp, granularity);
            counts.set(key, (counts.get(key) ?? 0) + 1);
        }
        return [...counts.entries()]
            .sort(([a], [b]) => compareKeys(a, b))
            .map(([period, count]) => ({ period, count }));
    }

    async function paymentTypeDistribution(
        filters: DashboardFilters = {}
    ): Promise<Array<CountRow<"paymentType">>> {
        const { orderPayments } = await dataset.filtered(filters);
        return countBy(orderPayments, (payment) => payment.paymentType).map(
            ([paymentType, total]) => ({ paymentType, total })
        );
    }

    async function reviewScoreDistribution(
        filters: DashboardFilters = {}
    ): Promise<Array<CountRow<"score", number>>> {
        const { orderReviews } = await dataset.filtered(filters);
        const counts = new Map<number, number>();
        for (const review of orderReviews) {
            counts.set(review.reviewScore, (counts.get(review.reviewScore) ?? 0) + 1);
        }
        return [...counts.entries()]
            .sort(([a], [b]) => a - b)
            .map(([score, total]) => ({ score, total }));
    }

    async function topProductCategories(
        filters: DashboardFilters = {},
        limit?: number
    ): Promise<Array<CountRow<"category">>> {
        const { orderItems, products } = await dataset.filtered(filters);
        const categoryByProduct = new Map(
            products.map((product) => [product.productId, product.productCategoryName])
        );
        return countBy(
            orderItems,
            (item) => categoryByProduct.get(item.productId) ?? UNKNOWN_CATEGORY_LABEL
        )
            .slice(0, clampTopN(limit, DEFAULT_TOP_CATEGORIES))
            .map(([category, total]) => ({ category, total }));
    }

    async function topSellers(
        filters: DashboardFilters = {},
        limit?: number
    ): Promise<Array<CountRow<"sellerId">>> {
        const { orderItems } = await dataset.filtered(filters);
        return countBy(orderItems, (item) => item.sellerId)
            .slice(0, clampTopN(limit, DEFAULT_TOP_SELLERS))
            .map(([sellerId, total]) => ({ sellerId, total }));
    }

    async function topLocations(
        filters: DashboardFilters = {},
        limit?: number
    ): Promise<LocationSales[]> {
        const { orders, orderItems, geolocation } = await dataset.filtered(filters);
        const itemsByOrder = new Map<string, number[]>();
        for (const item of orderItems) {
            const values = itemsByOrder.get(item.orderId) ?? [];
            values.push(item.totalValue);
            itemsByOrder.set(item.orderId, values);
        }

        const groups = new Map<
            string,
            { city: string; state: string; orderIds: Set<string>; totalValue: number }
        >();
        for (const order of orders) {
            const values = itemsByOrder.get(order.orderId);
            if (order.orderStatus !== DELIVERED_STATUS || !values) {
                continue;
            }
            const key = `${order.customerCity}|${order.customerState}`;
            const group = groups.get(key) ?? {
                city: order.customerCity,
                state: order.customerState,
                orderIds: new Set<string>(),
                totalValue: 0
            };
            if (!group.orderIds.has(order.orderId)) {
                group.orderIds.add(order.orderId);
                group.totalValue += values.reduce((sum, value) => sum + value, 0);
            }
            groups.set(key, group);
        }

        const geo = geolocationIndex(geolocation);
        const rows: LocationSales[] = [];
        for (const [key, group] of groups) {
            const point = geo.get(key);
            if (!point) {
                continue;
            }
            rows.push({
                location: `${toTitleCase(point.city)}, ${point.state}`,
                city: group.city,
                state: group.state,
                lat: point.lat,
                lng: point.lng,
                ordersCount: group.orderIds.size,
                totalValue: group.totalValue
            });
        }

        return rows
            .sort(
                (a, b) =>
                    b.ordersCount - a.ordersCount || compareKeys(a.location, b.location)
            )
            .slice(0, clampTopN(limit, DEFAULT_TOP_LOCATIONS));
    }

    return {
        filterOptions,
        orderStatusDistribution,
        ordersOverTime,
        paymentTypeDistribution,
        reviewScoreDistribution,
        topProductCategories,
        topSellers,
        topLocations
    };
}
