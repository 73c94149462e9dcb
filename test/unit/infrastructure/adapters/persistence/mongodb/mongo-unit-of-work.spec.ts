import { Test, TestingModule } from '@nestjs/testing';
import { getConnectionToken } from '@nestjs/mongoose';
import { DomainEvent } from '@domain/events';
import {
  MongoSessionContext,
  MongoUnitOfWork,
  UNIT_OF_WORK_OPTIONS,
  UnitOfWorkOptions,
} from '@infrastructure/adapters/persistence/mongodb';
import { AppLoggerService } from '@infrastructure/observability/logging/app-logger.service';

const event = (name: string): DomainEvent => ({
  name,
  aggregateType: 'Booking',
  aggregateId: 'booking-1',
  occurredAt: new Date('2026-03-01T10:00:00Z'),
  payload: {},
});

describe('MongoUnitOfWork', () => {
  const session = { id: 'session-1' };
  let mockConnection: { transaction: jest.Mock };
  let mockAppLogger: { logDomainEvents: jest.Mock };
  let sessions: MongoSessionContext;

  const createUnitOfWork = async (options: UnitOfWorkOptions): Promise<MongoUnitOfWork> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MongoUnitOfWork,
        MongoSessionContext,
        { provide: getConnectionToken(), useValue: mockConnection },
        { provide: AppLoggerService, useValue: mockAppLogger },
        { provide: UNIT_OF_WORK_OPTIONS, useValue: options },
      ],
    }).compile();

    sessions = module.get<MongoSessionContext>(MongoSessionContext);
    return module.get<MongoUnitOfWork>(MongoUnitOfWork);
  };

  beforeEach(() => {
    mockConnection = {
      transaction: jest.fn(async (callback: (s: unknown) => Promise<unknown>) => callback(session)),
    };
    mockAppLogger = { logDomainEvents: jest.fn() };
  });

  it('should run the work inside a transaction session', async () => {
    // Arrange
    const unitOfWork = await createUnitOfWork({ useTransactions: true });
    let seenSession: unknown = null;

    // Act
    const result = await unitOfWork.execute(async () => {
      seenSession = sessions.session();
      return 42;
    });

    // Assert
    expect(result).toBe(42);
    expect(seenSession).toBe(session);
    expect(mockConnection.transaction).toHaveBeenCalledTimes(1);
  });

  it('should publish events of the committed attempt only', async () => {
    // Arrange
    mockConnection.transaction.mockImplementation(
      async (callback: (s: unknown) => Promise<unknown>) => {
        await callback(session);
        return callback(session);
      },
    );
    const unitOfWork = await createUnitOfWork({ useTransactions: true });
    let attempt = 0;

    // Act
    await unitOfWork.execute(async () => {
      attempt++;
      sessions.scope()?.pendingEvents.push(event(`Attempt${attempt}`));
    });

    // Assert
    expect(mockAppLogger.logDomainEvents).toHaveBeenCalledTimes(1);
    expect(mockAppLogger.logDomainEvents).toHaveBeenCalledWith([event('Attempt2')]);
  });

  it('should not publish events when the work fails', async () => {
    // Arrange
    const unitOfWork = await createUnitOfWork({ useTransactions: true });

    // Act & Assert
    await expect(
      unitOfWork.execute(async () => {
        sessions.scope()?.pendingEvents.push(event('BookingCreated'));
        throw new Error('Write conflict');
      }),
    ).rejects.toThrow('Write conflict');
    expect(mockAppLogger.logDomainEvents).not.toHaveBeenCalled();
  });

  it('should join an outer unit of work', async () => {
    // Arrange
    const unitOfWork = await createUnitOfWork({ useTransactions: true });

    // Act
    await unitOfWork.execute(() => unitOfWork.execute(async () => 'inner'));

    // Assert
    expect(mockConnection.transaction).toHaveBeenCalledTimes(1);
  });

  it('should run without a session when transactions are disabled', async () => {
    // Arrange
    const unitOfWork = await createUnitOfWork({ useTransactions: false });
    let seenSession: unknown = 'unset';

    // Act
    await unitOfWork.execute(async () => {
      seenSession = sessions.session();
      sessions.scope()?.pendingEvents.push(event('BookingCreated'));
    });

    // Assert
    expect(seenSession).toBeNull();
    expect(mockConnection.transaction).not.toHaveBeenCalled();
    expect(mockAppLogger.logDomainEvents).toHaveBeenCalledWith([event('BookingCreated')]);
  });

  describe('with transactions disabled', () => {
    it('should not publish events when the work fails', async () => {
      // Arrange
      const unitOfWork = await createUnitOfWork({ useTransactions: false });

      // Act & Assert
      await expect(
        unitOfWork.execute(async () => {
          sessions.scope()?.pendingEvents.push(event('PaymentSucceeded'));
          throw new Error('Duplicate key');
        }),
      ).rejects.toThrow('Duplicate key');
      expect(mockAppLogger.logDomainEvents).not.toHaveBeenCalled();
    });

    it('should publish the events of nested work once, from the outer unit', async () => {
      // Arrange
      const unitOfWork = await createUnitOfWork({ useTransactions: false });

      // Act
      await unitOfWork.execute(async () => {
        sessions.scope()?.pendingEvents.push(event('BookingCancelled'));
        await unitOfWork.execute(async () => {
          sessions.scope()?.pendingEvents.push(event('PaymentRefunded'));
        });
      });

      // Assert
      expect(mockAppLogger.logDomainEvents).toHaveBeenCalledTimes(1);
      expect(mockAppLogger.logDomainEvents).toHaveBeenCalledWith([
        event('BookingCancelled'),
        event('PaymentRefunded'),
      ]);
    });
  });
});
