export const DEFAULT_LOG_LEVEL = "info";
export const TEST_LOG_LEVEL = "silent";
export const DEFAULT_LOG_FILE_NAME = "backlog-relay.log";
