export * from "./types/index.js";
export * from "./errors.js";
export { computeBmi, categorize, roundTo, BMI_THRESHOLDS } from "./bmi/engine.js";
export { checkMeasurement, WEIGHT_RANGE, HEIGHT_RANGE } from "./bmi/measurement.js";
export { openDatabase, Db, type Row, type RunResult } from "./store/database.js";
export { CredentialStore, hashPassword } from "./store/credentials.js";
export { RecordStore } from "./store/records.js";
export {
  summarize,
  categoryDistribution,
  trendSeries,
  recentRecords,
} from "./stats/aggregator.js";
export { toCsv, CSV_COLUMNS } from "./export/csv.js";
export { loadConfig, parseConfig, ConfigSchema, CONFIG_FILE, type Config } from "./config/loader.js";
export { Session } from "./session/session.js";
export { createServer, startServer, type ServerOptions } from "./mcp/server.js";
