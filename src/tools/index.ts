import { RfmService } from "../modules/rfm";
import {
    createCsvDatasetRepo,
    DatasetRepo
} from "../repositories/dataset-repo";
import {
    AnalyticsService,
    createAnalyticsService
} from "../services/analytics-service";
import { env } from "../config/env";
import type { DefinedTool } from "../types/tool";
import { createAnalyticsTools } from "./analytics-tool-factory";
import { createRfmTools } from "./rfm-tool-factory";

export default class DashboardToolsService {
    private readonly dataset: DatasetRepo;
    private readonly analytics: AnalyticsService;
    private readonly rfm: RfmService;

    constructor(options?: {
        dataset?: DatasetRepo;
        analytics?: AnalyticsService;
        rfm?: RfmService;
    }) {
        this.dataset = options?.dataset ?? createCsvDatasetRepo();
        this.analytics =
            options?.analytics ?? createAnalyticsService(this.dataset);
        this.rfm =
            options?.rfm ??
            new RfmService(this.dataset, { cacheEnabled: env.cacheEnabled });
    }

    /** Loads the dataset up front so the first tool call does not pay for it. */
    async init(): Promise<void> {
        await this.dataset.load();
    }

    defineTools(): DefinedTool[] {
        return [
            ...createAnalyticsTools(this.analytics),
            ...createRfmTools(this.rfm)
        ];
    }
}
