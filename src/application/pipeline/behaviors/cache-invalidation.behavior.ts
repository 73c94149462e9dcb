import { Inject, Injectable, Logger } from '@nestjs/common';
import { CacheInvalidationRule, getCacheInvalidationRules } from '../../caching';
import { MissingCacheInvalidationError } from '../../errors';
import { ICacheServicePort, IRequestMetricsPort } from '../../ports';
import { NextHandler, PipelineBehavior } from '../pipeline-behavior';
import { Command, Request, requestName } from '../request';

export interface CacheInvalidationOptions {
  /** Commands without rules fail instead of clearing the whole cache */
  requireExplicitRules: boolean;
  /** Commands without rules fail when running in the strict environment */
  throwOnMissingRulesInStrictEnvironment: boolean;
  strictValidationEnvironment: string;
  /** Current NODE_ENV */
  environment: string;
}

export const CACHE_INVALIDATION_OPTIONS = 'CACHE_INVALIDATION_OPTIONS';

/**
 * After a command has run, drops the cache prefixes its `@InvalidatesCache`
 * rules name. A command without rules clears the whole cache unless the
 * options make that an error.
 */
@Injectable()
export class CacheInvalidationBehavior implements PipelineBehavior {
  private readonly logger = new Logger(CacheInvalidationBehavior.name);
  // eslint-disable-next-line @typescript-eslint/ban-types
  private readonly rulesByType = new Map<Function, readonly CacheInvalidationRule[]>();

  constructor(
    @Inject('ICacheService')
    private readonly cache: ICacheServicePort,
    @Inject('IRequestMetrics')
    private readonly metrics: IRequestMetricsPort,
    @Inject(CACHE_INVALIDATION_OPTIONS)
    private readonly options: CacheInvalidationOptions,
  ) {}

  async handle<TResponse>(
    request: Request<TResponse>,
    next: NextHandler<TResponse>,
  ): Promise<TResponse> {
    const name = requestName(request);
    if (!(request instanceof Command)) {
      this.logger.debug(`${name} is not a command, skipping cache invalidation`);
      return next();
    }

    const response = await next();
    await this.invalidate(request, name);
    return response;
  }

  private async invalidate(request: object, name: string): Promise<void> {
    const rules = this.rulesFor(request);

    if (rules.length === 0) {
      if (this.mustThrowOnMissingRules()) {
        const error = new MissingCacheInvalidationError(name);
        this.logger.error(error.message);
        throw error;
      }

      this.logger.warn(
        `No cache invalidation rules found for command ${name}, invalidating all cache entries`,
      );
      await this.cache.clear();
      return;
    }

    const invalidated: string[] = [];
    for (const rule of rules) {
      for (const prefix of rule.prefixes) {
        const removed = await this.cache.removeByPrefix(prefix);
        this.metrics.recordCacheInvalidation(prefix, removed);
        invalidated.push(prefix);
      }
      this.logger.debug(
        `Invalidated ${rule.prefixes.length} prefixes: ${rule.prefixes.join(', ')} → ${rule.reason}`,
      );
    }

    this.logger.log(
      `Invalidated ${invalidated.length} cache prefixes for ${name}: ${invalidated.join(', ')}`,
    );
  }

  private rulesFor(request: object): readonly CacheInvalidationRule[] {
    const type = request.constructor;
    let rules = this.rulesByType.get(type);
    if (!rules) {
      rules = getCacheInvalidationRules(type);
      this.rulesByType.set(type, rules);
    }
    return rules;
  }

  private mustThrowOnMissingRules(): boolean {
    return (
      this.options.requireExplicitRules ||
      (this.options.throwOnMissingRulesInStrictEnvironment &&
        this.options.environment === this.options.strictValidationEnvironment)
    );
  }
}
