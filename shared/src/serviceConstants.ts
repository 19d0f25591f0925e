// Central service naming constants to avoid drift between the Function App and telemetry dashboards.

export const SERVICE_BACKEND = 'backend-functions'
export const SERVICE_LOCAL = 'local-functions'
