import { Logger } from '@nestjs/common';
import { success } from '@application/common';
import { LoggingBehavior, ResultQuery } from '@application/pipeline';

class StatusQuery extends ResultQuery<string> {}

describe('LoggingBehavior', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should log before and after the handler', async () => {
    // Arrange
    const log = jest.spyOn(Logger.prototype, 'log').mockImplementation();
    const behavior = new LoggingBehavior();

    // Act
    const response = await behavior.handle(new StatusQuery(), async () => success('up'));

    // Assert
    expect(response).toEqual(success('up'));
    expect(log).toHaveBeenCalledTimes(2);
    expect(log.mock.calls[0]).toEqual(['Handling StatusQuery']);
    expect(String(log.mock.calls[1][0])).toMatch(/^Handled StatusQuery in \d+ms$/);
  });
});
