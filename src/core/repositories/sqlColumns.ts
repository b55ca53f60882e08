export const IDENTIFIER_SELECT_COLUMNS = `
    id, value, status, attempt_count, last_attempt_at, last_error, created_at, updated_at
`;

export const WORKER_SELECT_COLUMNS = `
    id, name, role, health, daily_count, daily_limit, cooldown_until, last_reset_date, last_used_at
`;

export const RUN_SELECT_COLUMNS = `
    id, destination_id, status, config_json, started_at, finished_at,
    processed_count, success_count, failure_count, last_error
`;

export const RUN_LOG_SELECT_COLUMNS = `
    id, run_id, level, event, payload_json, created_at
`;
