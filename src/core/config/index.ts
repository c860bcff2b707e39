export { DEFAULT_LOG_FILE, DataSinkConfigError, dataSinkConfigSchema, loadDataSinkConfig } from "./config.js";
export type { DataSinkConfig, DataSinkConfigInput } from "./config.js";
