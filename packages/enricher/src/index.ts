export { WhatCmsClient, type WhatCmsClientOpts } from "./client";
export { DataEnricher, ENRICHMENT_COLUMNS, recordToColumns, type EnricherOpts } from "./pipeline";
export { createTechRecord, describeRecord, joinList } from "./record";
export { CATEGORY_COLUMNS, CATEGORY_LABELS, classify } from "./categories";
export { isSpreadsheet, readTable, writeTable } from "./utils/table";
export { Throttle, type Clock } from "./utils/throttle";
export * from "./errors";
export * from "./types";
export { CFG, delayFromSeconds } from "./config";
