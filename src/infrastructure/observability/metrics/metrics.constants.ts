/**
 * Prometheus metric names used throughout the application.
 */
export const METRICS = {
  // Counters
  HTTP_REQUESTS_TOTAL: 'http_requests_total',
  PIPELINE_REQUESTS_TOTAL: 'pipeline_requests_total',
  CACHE_LOOKUPS_TOTAL: 'cache_lookups_total',
  CACHE_INVALIDATED_ENTRIES_TOTAL: 'cache_invalidated_entries_total',
  TRANSACTIONS_TOTAL: 'transactions_total',
  BOOKINGS_TOTAL: 'bookings_total',

  // Histograms (latency)
  HTTP_REQUEST_DURATION: 'http_request_duration_seconds',
  PIPELINE_REQUEST_DURATION: 'pipeline_request_duration_seconds',
  DB_QUERY_DURATION: 'db_query_duration_seconds',
} as const;
