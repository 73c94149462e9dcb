export type RequestOutcome = 'success' | 'failure' | 'error';

/**
 * Outbound port for pipeline metrics.
 */
export interface IRequestMetricsPort {
  recordRequest(requestName: string, outcome: RequestOutcome, durationSeconds: number): void;

  recordCacheLookup(prefix: string, hit: boolean): void;

  recordCacheInvalidation(prefix: string, removedEntries: number): void;

  recordTransaction(requestName: string, outcome: 'committed' | 'rolled_back'): void;
}
