// Grace period for the HTTP server and the running sweep during shutdown
export const APP_CLOSE_TIMEOUT_MS = 25000

// Expired transfers deleted in parallel within one sweep batch
export const SWEEP_CONCURRENCY = 10

// Upper bound of expiry scan batches per sweep pass
export const SWEEP_MAX_BATCHES = 20

// Pending uploads not refreshed for this long are treated as abandoned by the sweeper
export const PENDING_UPLOAD_MAX_AGE_MS = 24 * 60 * 60 * 1000
