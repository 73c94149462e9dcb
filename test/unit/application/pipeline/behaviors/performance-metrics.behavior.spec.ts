import { Logger } from '@nestjs/common';
import { failure, success } from '@application/common';
import { IRequestMetricsPort } from '@application/ports';
import { PerformanceMetricsBehavior, ResultQuery } from '@application/pipeline';
import { createMetricsMock } from './test-doubles';

class ReportQuery extends ResultQuery<string> {}

describe('PerformanceMetricsBehavior', () => {
  let metrics: jest.Mocked<IRequestMetricsPort>;
  let behavior: PerformanceMetricsBehavior;
  let warn: jest.SpyInstance;

  const elapse = (ms: number) => {
    jest.spyOn(Date, 'now').mockReturnValueOnce(1_000).mockReturnValueOnce(1_000 + ms);
  };

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'debug').mockImplementation();
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'error').mockImplementation();
    warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation();
    metrics = createMetricsMock();
    behavior = new PerformanceMetricsBehavior(metrics, { slowRequestMs: 500, moderateRequestMs: 100 });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should record a successful request in seconds', async () => {
    elapse(250);

    await behavior.handle(new ReportQuery(), async () => success('report'));

    expect(metrics.recordRequest).toHaveBeenCalledWith('ReportQuery', 'success', 0.25);
    expect(warn).not.toHaveBeenCalled();
  });

  it('should warn about slow requests', async () => {
    elapse(750);

    await behavior.handle(new ReportQuery(), async () => success('report'));

    expect(warn).toHaveBeenCalledWith('ReportQuery took 750ms - this is slower than expected');
  });

  it('should record a failure result as a failure', async () => {
    elapse(10);

    await behavior.handle(new ReportQuery(), async () => failure('No data.'));

    expect(metrics.recordRequest).toHaveBeenCalledWith('ReportQuery', 'failure', 0.01);
  });

  it('should record and rethrow errors', async () => {
    elapse(20);

    await expect(
      behavior.handle(new ReportQuery(), async () => {
        throw new Error('timeout');
      }),
    ).rejects.toThrow('timeout');
    expect(metrics.recordRequest).toHaveBeenCalledWith('ReportQuery', 'error', 0.02);
  });
});
