export * from "./core/entities";
export * from "./core/random/SeededRandom";
export * from "./core/engine/SyntheticDataGenerator";
export * from "./core/engine/MetricsCalculator";
export * from "./core/state/ViewStateStore";
export * from "./interfaces/view/DashboardProjector";
export * from "./services/DashboardService";
export { loadActionsFromCsv } from "./data/csv/CsvActionLoader";
export type { ActionLoaderResult, LoaderError } from "./data/csv/CsvActionLoader";
export { fmtInt, fmtPct, fmtThousands } from "./utils/format";
