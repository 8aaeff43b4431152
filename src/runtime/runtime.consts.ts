export const CONNECTIVITY_TASK = "connectivity-check";
export const RETENTION_TASK = "retention-sweep";
