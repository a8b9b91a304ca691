import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

const booleanFlag = z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .transform((value) => value === "true" || value === "1" || value === "yes");

const logLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

export type LogLevel = z.infer<typeof logLevelSchema>;

const envSchema = z
    .object({
        DATASET_DIR: z.string().min(1).optional(),
        RFM_CACHE_ENABLED: booleanFlag.optional(),
        LOG_LEVEL: logLevelSchema.optional(),
        NODE_ENV: z.string().optional()
    })
    .passthrough();

const parsed = envSchema.parse(process.env);

const defaultLogLevel: LogLevel = parsed.NODE_ENV === "test" ? "silent" : "info";

export const env: {
    datasetDir: string;
    cacheEnabled: boolean;
    logLevel: LogLevel;
} = {
    datasetDir: parsed.DATASET_DIR ?? "./data",
    cacheEnabled: parsed.RFM_CACHE_ENABLED ?? true,
    logLevel: parsed.LOG_LEVEL ?? defaultLogLevel
};
