import { Injectable } from '@nestjs/common';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter, Histogram } from 'prom-client';
import { IRequestMetricsPort, RequestOutcome } from '@application/ports';
import { BookingStatusValue } from '@domain/value-objects';
import { METRICS } from './metrics.constants';

/**
 * Prometheus-backed metrics. Also serves as the pipeline's request metrics port.
 */
@Injectable()
export class MetricsService implements IRequestMetricsPort {
  constructor(
    @InjectMetric(METRICS.HTTP_REQUESTS_TOTAL)
    private readonly httpRequestsCounter: Counter<string>,

    @InjectMetric(METRICS.PIPELINE_REQUESTS_TOTAL)
    private readonly pipelineRequestsCounter: Counter<string>,

    @InjectMetric(METRICS.CACHE_LOOKUPS_TOTAL)
    private readonly cacheLookupsCounter: Counter<string>,

    @InjectMetric(METRICS.CACHE_INVALIDATED_ENTRIES_TOTAL)
    private readonly cacheInvalidationsCounter: Counter<string>,

    @InjectMetric(METRICS.TRANSACTIONS_TOTAL)
    private readonly transactionsCounter: Counter<string>,

    @InjectMetric(METRICS.BOOKINGS_TOTAL)
    private readonly bookingsCounter: Counter<string>,

    @InjectMetric(METRICS.HTTP_REQUEST_DURATION)
    private readonly httpDurationHistogram: Histogram<string>,

    @InjectMetric(METRICS.PIPELINE_REQUEST_DURATION)
    private readonly pipelineDurationHistogram: Histogram<string>,

    @InjectMetric(METRICS.DB_QUERY_DURATION)
    private readonly dbDurationHistogram: Histogram<string>,
  ) {}

  // HTTP Metrics
  recordHttpRequest(method: string, path: string, status: number, durationSec: number): void {
    this.httpRequestsCounter.inc({ method, path, status: status.toString() });
    this.httpDurationHistogram.observe({ method, path, status: status.toString() }, durationSec);
  }

  // Pipeline Metrics
  recordRequest(requestName: string, outcome: RequestOutcome, durationSeconds: number): void {
    this.pipelineRequestsCounter.inc({ request: requestName, outcome });
    this.pipelineDurationHistogram.observe({ request: requestName }, durationSeconds);
  }

  recordCacheLookup(prefix: string, hit: boolean): void {
    this.cacheLookupsCounter.inc({ prefix, result: hit ? 'hit' : 'miss' });
  }

  recordCacheInvalidation(prefix: string, removedEntries: number): void {
    this.cacheInvalidationsCounter.inc({ prefix }, removedEntries);
  }

  recordTransaction(requestName: string, outcome: 'committed' | 'rolled_back'): void {
    this.transactionsCounter.inc({ request: requestName, outcome });
  }

  // Database Metrics
  recordDBQuery(operation: string, collection: string, durationSec: number): void {
    this.dbDurationHistogram.observe({ operation, collection }, durationSec);
  }

  // Booking Metrics
  recordBooking(status: BookingStatusValue): void {
    this.bookingsCounter.inc({ status });
  }
}
