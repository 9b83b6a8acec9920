export * from "./types/attendance";
export * from "./types/meetingSource";
export * from "./time/timeHelper";
export * from "./ingestion/normalize";
export * from "./ingestion/zoomPayload";
export * from "./ingestion/mapping";
export * from "./merge/sessionMerger";
export * from "./report/assembler";
export * from "./report/occurrences";
export * from "./zoom/client";
export * from "./output/spreadsheet";
export * from "./output/mailer";
export * from "./formatting/reportEmail";
export * from "./storage/db";
export * from "./storage/repositories";
export * from "./config/config";
export * from "./config/envTemplate";
export * from "./pipeline/generateReport";
