import { Global, Module } from '@nestjs/common';
import {
  makeCounterProvider,
  makeHistogramProvider,
  PrometheusModule,
} from '@willsoto/nestjs-prometheus';
import { METRICS } from './metrics.constants';
import { MetricsService } from './metrics.service';
import { MetricsInterceptor } from './metrics.interceptor';

@Global()
@Module({
  imports: [
    PrometheusModule.register({
      path: '/metrics',
      defaultMetrics: {
        enabled: true,
      },
    }),
  ],
  providers: [
    makeCounterProvider({
      name: METRICS.HTTP_REQUESTS_TOTAL,
      help: 'Total number of HTTP requests',
      labelNames: ['method', 'path', 'status'],
    }),
    makeCounterProvider({
      name: METRICS.PIPELINE_REQUESTS_TOTAL,
      help: 'Total number of commands and queries handled by the request pipeline',
      labelNames: ['request', 'outcome'],
    }),
    makeCounterProvider({
      name: METRICS.CACHE_LOOKUPS_TOTAL,
      help: 'Cache lookups made by cacheable queries',
      labelNames: ['prefix', 'result'],
    }),
    makeCounterProvider({
      name: METRICS.CACHE_INVALIDATED_ENTRIES_TOTAL,
      help: 'Cache entries removed by command invalidation rules',
      labelNames: ['prefix'],
    }),
    makeCounterProvider({
      name: METRICS.TRANSACTIONS_TOTAL,
      help: 'Command transactions by outcome',
      labelNames: ['request', 'outcome'],
    }),
    makeCounterProvider({
      name: METRICS.BOOKINGS_TOTAL,
      help: 'Booking status transitions',
      labelNames: ['status'],
    }),

    // Latency
    makeHistogramProvider({
      name: METRICS.HTTP_REQUEST_DURATION,
      help: 'HTTP request duration in seconds',
      labelNames: ['method', 'path', 'status'],
      buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10],
    }),
    makeHistogramProvider({
      name: METRICS.PIPELINE_REQUEST_DURATION,
      help: 'Request pipeline duration in seconds',
      labelNames: ['request'],
      buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1, 2, 5],
    }),
    makeHistogramProvider({
      name: METRICS.DB_QUERY_DURATION,
      help: 'Database query duration in seconds',
      labelNames: ['operation', 'collection'],
      buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
    }),
    MetricsService,
    { provide: 'IRequestMetrics', useExisting: MetricsService },
    MetricsInterceptor,
  ],
  exports: [PrometheusModule, MetricsService, 'IRequestMetrics', MetricsInterceptor],
})
export class MetricsModule {}
