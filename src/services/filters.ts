import { isValid, parseISO } from "date-fns";
import { formatInTimeZone } from "date-fns-tz";
import type {
    DashboardFilters,
    Dataset,
    FilteredDataset,
    FilteredOrder
} from "../types/dataset";
import { ToolError } from "../utils/error";

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export type FilterOptions = {
    minDate: string | null;
    maxDate: string | null;
    states: string[];
    cities: string[];
};

/** UTC calendar date of a timestamp, as `YYYY-MM-DD`. */
export const toDayKey = (date: Date): string =>
    formatInTimeZone(date, "UTC", "yyyy-MM-dd");

const sortedUnique = (values: Iterable<string>): string[] =>
    [...new Set(values)].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

const assertDate = (label: string, value: string | undefined): void => {
    if (value === undefined) {
        return;
    }
    if (!DATE_PATTERN.test(value) || !isValid(parseISO(value))) {
        throw new ToolError(
            `${label} must be a calendar date (YYYY-MM-DD), got "${value}"`,
            "invalid_filters",
            { [label]: value }
        );
    }
};

/**
 * Validates the filters and puts them in a canonical form: location lists
 * sorted and de-duplicated, empty lists dropped (no restriction).
 */
export function normalizeFilters(filters: DashboardFilters = {}): DashboardFilters {
    assertDate("startDate", filters.startDate);
    assertDate("endDate", filters.endDate);
    if (
        filters.startDate !== undefined &&
        filters.endDate !== undefined &&
        filters.startDate > filters.endDate
    ) {
        throw new ToolError(
            "startDate must not be after endDate",
            "invalid_filters",
            { startDate: filters.startDate, endDate: filters.endDate }
        );
    }

    const normalized: DashboardFilters = {};
    if (filters.startDate !== undefined) {
        normalized.startDate = filters.startDate;
    }
    if (filters.endDate !== undefined) {
        normalized.endDate = filters.endDate;
    }
    if (filters.states?.length) {
        normalized.states = sortedUnique(filters.states);
    }
    if (filters.cities?.length) {
        normalized.cities = sortedUnique(filters.cities);
    }
    return normalized;
}

export function applyFilters(
    dataset: Dataset,
    filters: DashboardFilters = {}
): FilteredDataset {
    const { startDate, endDate, states, cities } = normalizeFilters(filters);
    const stateSet = states ? new Set(states) : null;
    const citySet = cities ? new Set(cities) : null;

    const customers = new Map(
        dataset.customers
            .filter(
                (customer) =>
                    (!stateSet || stateSet.has(customer.customerState)) &&
                    (!citySet || citySet.has(customer.customerCity))
            )
            .map((customer) => [customer.customerId, customer])
    );

    const orders: FilteredOrder[] = [];
    for (const order of dataset.orders) {
        if (startDate !== undefined || endDate !== undefined) {
            if (!order.orderPurchaseTimestamp) {
                continue;
            }
            const day = toDayKey(order.orderPurchaseTimestamp);
            if (startDate !== undefined && day < startDate) {
                continue;
            }
            if (endDate !== undefined && day > endDate) {
                continue;
            }
        }

        const customer = customers.get(order.customerId);
        if (!customer) {
            continue;
        }
        orders.push({
            ...order,
            customerCity: customer.customerCity,
            customerState: customer.customerState
        });
    }

    const orderIds = new Set(orders.map((order) => order.orderId));
    return {
        orders,
        orderItems: dataset.orderItems.filter((item) => orderIds.has(item.orderId)),
        orderPayments: dataset.orderPayments.filter((payment) =>
            orderIds.has(payment.orderId)
        ),
        orderReviews: dataset.orderReviews.filter((review) =>
            orderIds.has(review.orderId)
        ),
        products: dataset.products,
        geolocation: dataset.geolocation
    };
}

/** Values a dashboard offers in its date picker and location multiselects. */
export function listFilterOptions(
    dataset: Dataset,
    states?: string[]
): FilterOptions {
    let minMs: number | null = null;
    let maxMs: number | null = null;
    for (const order of dataset.orders) {
        const ms = order.orderPurchaseTimestamp?.getTime();
        if (ms === undefined || Number.isNaN(ms)) {
            continue;
        }
        minMs = minMs === null ? ms : Math.min(minMs, ms);
        maxMs = maxMs === null ? ms : Math.max(maxMs, ms);
    }

    const stateSet = states?.length ? new Set(states) : null;
    return {
        minDate: minMs === null ? null : toDayKey(new Date(minMs)),
        maxDate: maxMs === null ? null : toDayKey(new Date(maxMs)),
        states: sortedUnique(dataset.customers.map((c) => c.customerState)),
        cities: sortedUnique(
            dataset.customers
                .filter((c) => !stateSet || stateSet.has(c.customerState))
                .map((c) => c.customerCity)
        )
    };
}
