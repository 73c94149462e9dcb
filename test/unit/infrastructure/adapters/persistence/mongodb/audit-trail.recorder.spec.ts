import { Test, TestingModule } from '@nestjs/testing';
import { DomainEvent } from '@domain/events';
import { AuditLog } from '@domain/entities';
import {
  AuditTrailRecorder,
  resolveAuditAction,
} from '@infrastructure/adapters/persistence/mongodb/audit-trail.recorder';
import { RequestContext } from '@infrastructure/context/request-context';
import { AppLoggerService } from '@infrastructure/observability/logging/app-logger.service';

const event = (name: string): DomainEvent => ({
  name,
  aggregateType: 'Test',
  aggregateId: 'agg-1',
  occurredAt: new Date('2026-03-01T10:00:00Z'),
  payload: {},
});

describe('resolveAuditAction', () => {
  it('should map events with a dedicated action', () => {
    expect(resolveAuditAction([event('PaymentSucceeded')], false)).toBe('payment_processed');
    expect(resolveAuditAction([event('UserLoggedIn')], false)).toBe('login');
    expect(resolveAuditAction([event('UserPasswordReset')], false)).toBe('password_reset');
  });

  it('should pick the first mapped event', () => {
    expect(resolveAuditAction([event('CourseUpdated'), event('BookingCreated')], true)).toBe(
      'booking_created',
    );
  });

  it('should treat other booking events as booking updates', () => {
    expect(resolveAuditAction([event('BookingConfirmed')], false)).toBe('booking_updated');
  });

  it('should treat deactivation as a delete', () => {
    expect(resolveAuditAction([event('CourseDeactivated')], false)).toBe('delete');
  });

  it('should fall back to create or update', () => {
    expect(resolveAuditAction([], true)).toBe('create');
    expect(resolveAuditAction([event('CourseUpdated')], false)).toBe('update');
  });
});

describe('AuditTrailRecorder', () => {
  let recorder: AuditTrailRecorder;
  let requestContext: RequestContext;
  let mockAuditLogs: { append: jest.Mock };
  let mockAppLogger: { logAuditEntry: jest.Mock };

  beforeEach(async () => {
    mockAuditLogs = { append: jest.fn().mockResolvedValue(undefined) };
    mockAppLogger = { logAuditEntry: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AuditTrailRecorder,
        RequestContext,
        { provide: 'IAuditLogRepository', useValue: mockAuditLogs },
        { provide: AppLoggerService, useValue: mockAppLogger },
      ],
    }).compile();

    recorder = module.get<AuditTrailRecorder>(AuditTrailRecorder);
    requestContext = module.get<RequestContext>(RequestContext);
  });

  it('should record the whole document for an insert', async () => {
    // Act
    const entry = await recorder.record({
      entityName: 'Course',
      entityId: 'course-1',
      previous: null,
      current: {
        _id: 'course-1',
        title: 'ECG Basics',
        priceCents: 8900,
        createdAt: new Date('2026-03-01T10:00:00Z'),
      },
      events: [],
    });

    // Assert
    expect(entry).toBeInstanceOf(AuditLog);
    expect(entry?.action).toBe('create');
    expect(entry?.newValues).toBe('{"title":"ECG Basics","priceCents":8900}');
    expect(entry?.oldValues).toBeNull();
    expect(entry?.metadata).toBeNull();
    expect(mockAuditLogs.append).toHaveBeenCalledWith(entry);
    expect(mockAppLogger.logAuditEntry).toHaveBeenCalledWith({
      entityName: 'Course',
      entityId: 'course-1',
      action: 'create',
      userId: null,
    });
  });

  it('should record only changed fields for an update', async () => {
    // Act
    const entry = await recorder.record({
      entityName: 'User',
      entityId: 'user-1',
      previous: { _id: 'user-1', name: 'Ada', timezone: 'UTC', passwordHash: 'hash-1' },
      current: { _id: 'user-1', name: 'Ada L.', timezone: 'UTC', passwordHash: 'hash-2' },
      events: [],
    });

    // Assert
    expect(entry?.action).toBe('update');
    expect(entry?.oldValues).toBe('{"name":"Ada"}');
    expect(entry?.newValues).toBe('{"name":"Ada L."}');
  });

  it('should redact credentials', async () => {
    // Act
    const entry = await recorder.record({
      entityName: 'User',
      entityId: 'user-1',
      previous: null,
      current: { name: 'Ada', passwordHash: 'hash-1', passwordResetToken: null },
      events: [],
    });

    // Assert
    expect(entry?.newValues).toBe(
      '{"name":"Ada","passwordHash":"[REDACTED]","passwordResetToken":"[REDACTED]"}',
    );
  });

  it('should skip writes that change nothing', async () => {
    // Act
    const entry = await recorder.record({
      entityName: 'Course',
      entityId: 'course-1',
      previous: { title: 'ECG Basics' },
      current: { title: 'ECG Basics' },
      events: [],
    });

    // Assert
    expect(entry).toBeNull();
    expect(mockAuditLogs.append).not.toHaveBeenCalled();
  });

  it('should attach request metadata and event names', async () => {
    // Act
    const entry = await requestContext.run(
      { requestId: 'req-1', userId: 'user-9', ipAddress: '127.0.0.1', userAgent: 'jest' },
      () =>
        recorder.record({
          entityName: 'Booking',
          entityId: 'booking-1',
          previous: null,
          current: { status: 'pending' },
          events: [event('BookingCreated')],
        }),
    );

    // Assert
    expect(entry?.action).toBe('booking_created');
    expect(entry?.userId).toBe('user-9');
    expect(entry?.ipAddress).toBe('127.0.0.1');
    expect(entry?.userAgent).toBe('jest');
    expect(entry?.metadata).toBe('{"events":["BookingCreated"],"requestId":"req-1"}');
  });
});
