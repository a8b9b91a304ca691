import { env } from "../config/env";
import { cleanDataset } from "../data/cleaning";
import { loadDataset } from "../data/csv-loader";
import { ResultCache } from "../lib/result-cache";
import { applyFilters, normalizeFilters } from "../services/filters";
import type {
    DashboardFilters,
    Dataset,
    FilteredDataset,
    RawDataset
} from "../types/dataset";
import { describeError, logEvent } from "../utils/log";

export type DatasetLoader = () => Promise<RawDataset>;

export type DatasetRepo = {
    load: () => Promise<Dataset>;
    filtered: (filters?: DashboardFilters) => Promise<FilteredDataset>;
};

export function createDatasetRepo(
    loader: DatasetLoader,
    options: { cacheEnabled: boolean } = { cacheEnabled: env.cacheEnabled }
): DatasetRepo {
    let pending: Promise<Dataset> | null = null;
    const views = new ResultCache<FilteredDataset>({
        enabled: options.cacheEnabled,
        maxEntries: 16
    });

    function load(): Promise<Dataset> {
        if (!pending) {
            const startedAt = Date.now();
            pending = loader()
                .then((raw) => {
                    const dataset = cleanDataset(raw);
                    logEvent("info", "dataset.ready", {
                        orders: dataset.orders.length,
                        customers: dataset.customers.length,
                        duration_ms: Date.now() - startedAt
                    });
                    return dataset;
                })
                .catch((error: unknown) => {
                    // Forget the failed attempt so the next call retries.
                    pending = null;
                    logEvent("error", "dataset.load_failed", describeError(error));
                    throw error;
                });
        }
        return pending;
    }

    async function filtered(
        filters: DashboardFilters = {}
    ): Promise<FilteredDataset> {
        const normalized = normalizeFilters(filters);
        return views.getOrCompute("filtered", normalized, async () =>
            applyFilters(await load(), normalized)
        );
    }

    return { load, filtered };
}

export function createCsvDatasetRepo(
    dir: string = env.datasetDir,
    options: { cacheEnabled: boolean } = { cacheEnabled: env.cacheEnabled }
): DatasetRepo {
    return createDatasetRepo(() => loadDataset(dir), options);
}
