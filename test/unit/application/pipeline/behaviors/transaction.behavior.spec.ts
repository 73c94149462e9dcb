import { failure, success } from '@application/common';
import { IRequestMetricsPort } from '@application/ports';
import { ResultCommand, ResultQuery, TransactionBehavior } from '@application/pipeline';
import { FakeUnitOfWork, createMetricsMock } from './test-doubles';

class RenameCommand extends ResultCommand<string> {}

class LoginAttemptCommand extends ResultCommand<string> {
  readonly commitFailedResults = true;
}

class ListQuery extends ResultQuery<string[]> {}

describe('TransactionBehavior', () => {
  let unitOfWork: FakeUnitOfWork;
  let metrics: jest.Mocked<IRequestMetricsPort>;
  let behavior: TransactionBehavior;

  beforeEach(() => {
    unitOfWork = new FakeUnitOfWork();
    metrics = createMetricsMock();
    behavior = new TransactionBehavior(unitOfWork, metrics);
  });

  it('should not open a transaction for queries', async () => {
    const response = await behavior.handle(new ListQuery(), async () => success(['a']));

    expect(response).toEqual(success(['a']));
    expect(unitOfWork.commits).toBe(0);
    expect(metrics.recordTransaction).not.toHaveBeenCalled();
  });

  it('should commit a successful command', async () => {
    const response = await behavior.handle(new RenameCommand(), async () => success('renamed'));

    expect(response).toEqual(success('renamed'));
    expect(unitOfWork.commits).toBe(1);
    expect(metrics.recordTransaction).toHaveBeenCalledWith('RenameCommand', 'committed');
  });

  it('should roll back a failure result and still return it', async () => {
    const response = await behavior.handle(new RenameCommand(), async () =>
      failure('Name already taken.'),
    );

    expect(response).toEqual(failure('Name already taken.'));
    expect(unitOfWork.rollbacks).toBe(1);
    expect(unitOfWork.commits).toBe(0);
    expect(metrics.recordTransaction).toHaveBeenCalledWith('RenameCommand', 'rolled_back');
  });

  it('should commit a failure result when the command asks for it', async () => {
    const response = await behavior.handle(new LoginAttemptCommand(), async () =>
      failure('Invalid email or password.'),
    );

    expect(response).toEqual(failure('Invalid email or password.'));
    expect(unitOfWork.commits).toBe(1);
    expect(metrics.recordTransaction).toHaveBeenCalledWith('LoginAttemptCommand', 'committed');
  });

  it('should roll back and rethrow errors', async () => {
    await expect(
      behavior.handle(new RenameCommand(), async () => {
        throw new Error('write conflict');
      }),
    ).rejects.toThrow('write conflict');

    expect(unitOfWork.rollbacks).toBe(1);
    expect(metrics.recordTransaction).toHaveBeenCalledWith('RenameCommand', 'rolled_back');
  });
});
