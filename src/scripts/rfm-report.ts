import { parseArgs } from "node:util";
import { env } from "../config/env";
import RfmService from "../modules/rfm/service";
import { createCsvDatasetRepo } from "../repositories/dataset-repo";
import { describeError, logEvent } from "../utils/log";

async function run(): Promise<void> {
    const { values } = parseArgs({
        options: {
            dir: { type: "string", default: env.datasetDir },
            start: { type: "string" },
            end: { type: "string" },
            state: { type: "string", multiple: true },
            city: { type: "string", multiple: true },
            segment: { type: "string", multiple: true }
        }
    });

    const service = new RfmService(createCsvDatasetRepo(values.dir, { cacheEnabled: false }), {
        cacheEnabled: false
    });

    const report = await service.report(
        {
            startDate: values.start,
            endDate: values.end,
            states: values.state,
            cities: values.city
        },
        values.segment ?? []
    );

    console.log(`Anchor date: ${report.anchorDate?.toISOString() ?? "n/a"}`);
    console.log(`Customers scored: ${report.records.length}`);
    console.log("\nSegment summary");
    console.table(report.summary.map((row) => service.toSummaryRow(row)));
    console.log("\nPareto by monetary value");
    console.table(report.pareto.map((row) => service.toSummaryRow(row)));
}

run().catch((error: unknown) => {
    logEvent("error", "rfm_report.failed", describeError(error));
    process.exitCode = 1;
});
