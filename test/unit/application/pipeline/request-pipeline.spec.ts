import { success, Result } from '@application/common';
import {
  NextHandler,
  PipelineBehavior,
  Request,
  RequestHandler,
  RequestPipeline,
  ResultQuery,
} from '@application/pipeline';

class PingQuery extends ResultQuery<string> {}

class RecordingBehavior implements PipelineBehavior {
  constructor(
    private readonly name: string,
    private readonly calls: string[],
  ) {}

  async handle<TResponse>(
    _request: Request<TResponse>,
    next: NextHandler<TResponse>,
  ): Promise<TResponse> {
    this.calls.push(`${this.name}:before`);
    const response = await next();
    this.calls.push(`${this.name}:after`);
    return response;
  }
}

describe('RequestPipeline', () => {
  it('should run behaviors outermost first and the handler last', async () => {
    // Arrange
    const calls: string[] = [];
    const handler: RequestHandler<PingQuery, Result<string>> = {
      handle: async () => {
        calls.push('handler');
        return success('pong');
      },
    };
    const pipeline = new RequestPipeline([
      new RecordingBehavior('validation', calls),
      new RecordingBehavior('caching', calls),
      new RecordingBehavior('logging', calls),
    ]);

    // Act
    const result = await pipeline.send(new PingQuery(), handler);

    // Assert
    expect(result).toEqual(success('pong'));
    expect(calls).toEqual([
      'validation:before',
      'caching:before',
      'logging:before',
      'handler',
      'logging:after',
      'caching:after',
      'validation:after',
    ]);
  });

  it('should let a behavior short-circuit the handler', async () => {
    const handler = { handle: jest.fn() };
    const shortCircuit: PipelineBehavior = {
      handle: async <TResponse>(request: Request<TResponse>) => {
        if (!request.validationFailure) {
          throw new Error('expected a result request');
        }
        return request.validationFailure(['blocked']);
      },
    };
    const pipeline = new RequestPipeline([shortCircuit]);

    const result = await pipeline.send(new PingQuery(), handler);

    expect(result).toEqual({ ok: false, kind: 'validation', errors: ['blocked'] });
    expect(handler.handle).not.toHaveBeenCalled();
  });

  it('should call the handler directly without behaviors', async () => {
    const pipeline = new RequestPipeline([]);

    const result = await pipeline.send(new PingQuery(), { handle: async () => success('direct') });

    expect(result).toEqual(success('direct'));
  });
});
