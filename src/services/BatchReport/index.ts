export * from "./BatchReportSchema";
export * from "./BatchReportStoreJson";
export * from "./buildBatchReport";
