import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import type { DatasetTable, RawDataset } from "../types/dataset";
import { DatasetError } from "../utils/error";
import { logEvent } from "../utils/log";
import { TABLE_SCHEMAS } from "./schemas";

export const DATASET_FILES: Record<DatasetTable, string> = {
    customers: "olist_customers_dataset.csv",
    geolocation: "olist_geolocation_dataset.csv",
    orderItems: "olist_order_items_dataset.csv",
    orderPayments: "olist_order_payments_dataset.csv",
    orderReviews: "olist_order_reviews_dataset.csv",
    orders: "olist_orders_dataset.csv",
    products: "olist_products_dataset.csv",
    sellers: "olist_sellers_dataset.csv"
};

const recordsSchema = z.array(z.record(z.string()));

export function parseTable<K extends DatasetTable>(
    table: K,
    content: string
): Array<RawDataset[K][number]> {
    let raw: unknown;
    try {
        raw = parse(content, {
            bom: true,
            columns: true,
            skip_empty_lines: true,
            trim: true
        });
    } catch (error) {
        throw new DatasetError(`Malformed CSV in ${table}`, {
            table,
            cause: error instanceof Error ? error.message : String(error)
        });
    }
    const records = recordsSchema.parse(raw);

    const schema = TABLE_SCHEMAS[table];
    const rows: Array<RawDataset[K][number]> = [];
    records.forEach((record, index) => {
        const result = schema.safeParse(record);
        if (!result.success) {
            const issue = result.error.issues[0];
            // +2: one for the header line, one for 1-based numbering.
            const line = index + 2;
            throw new DatasetError(
                `Invalid row ${line} in ${table}: ${issue?.path.join(".") ?? ""} ${issue?.message ?? ""}`.trim(),
                { table, line, issues: result.error.issues }
            );
        }
        rows.push(result.data);
    });
    return rows;
}

async function readTable<K extends DatasetTable>(
    dir: string,
    table: K,
    fileName: string
): Promise<Array<RawDataset[K][number]>> {
    const filePath = path.resolve(dir, fileName);
    let content: string;
    try {
        content = await readFile(filePath, "utf8");
    } catch (error) {
        throw new DatasetError(`Could not read ${table} from ${filePath}`, {
            table,
            path: filePath,
            cause: error instanceof Error ? error.message : String(error)
        });
    }

    const startedAt = Date.now();
    const rows = parseTable(table, content);
    logEvent("info", "dataset.table_loaded", {
        table,
        rows: rows.length,
        duration_ms: Date.now() - startedAt
    });
    return rows;
}

export async function loadDataset(
    dir: string,
    files: Partial<Record<DatasetTable, string>> = {}
): Promise<RawDataset> {
    const names = { ...DATASET_FILES, ...files };
    const [
        customers,
        geolocation,
        orderItems,
        orderPayments,
        orderReviews,
        orders,
        products,
        sellers
    ] = await Promise.all([
        readTable(dir, "customers", names.customers),
        readTable(dir, "geolocation", names.geolocation),
        readTable(dir, "orderItems", names.orderItems),
        readTable(dir, "orderPayments", names.orderPayments),
        readTable(dir, "orderReviews", names.orderReviews),
        readTable(dir, "orders", names.orders),
        readTable(dir, "products", names.products),
        readTable(dir, "sellers", names.sellers)
    ]);

    return {
        customers,
        geolocation,
        orderItems,
        orderPayments,
        orderReviews,
        orders,
        products,
        sellers
    };
}
