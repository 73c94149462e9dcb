import { AvailabilitySlot } from '@domain/entities';
import { EntityId, Money } from '@domain/value-objects';

describe('AvailabilitySlot', () => {
  const start = new Date('2025-06-01T10:00:00Z');
  const end = new Date('2025-06-01T11:30:00Z');

  const createTestSlot = (maxParticipants = 1): AvailabilitySlot =>
    AvailabilitySlot.create({
      courseId: EntityId.fromString('course-1'),
      instructorId: EntityId.fromString('instructor-1'),
      startTime: start,
      endTime: end,
      price: Money.of(60),
      maxParticipants,
    });

  it('should create a slot with full capacity available', () => {
    const slot = createTestSlot(3);

    expect(slot.remainingCapacity).toBe(3);
    expect(slot.durationMinutes).toBe(90);
    expect(slot.isBooked).toBe(false);
  });

  it('should reject an end time before the start time', () => {
    expect(() =>
      AvailabilitySlot.create({
        courseId: EntityId.fromString('course-1'),
        instructorId: EntityId.fromString('instructor-1'),
        startTime: end,
        endTime: start,
        price: Money.of(60),
      }),
    ).toThrow('End time must be after start time.');
  });

  it('should reject a non-positive capacity', () => {
    expect(() => createTestSlot(0)).toThrow('Max participants must be positive.');
  });

  it('should mark the slot booked when the last seat is taken', () => {
    const slot = createTestSlot(2);

    slot.addParticipant();
    expect(slot.isBooked).toBe(false);

    slot.addParticipant();
    expect(slot.isBooked).toBe(true);
    expect(slot.isAtFullCapacity()).toBe(true);
    expect(() => slot.addParticipant()).toThrow('Slot is at maximum capacity.');
  });

  it('should free a seat when a participant leaves', () => {
    const slot = createTestSlot(1);
    slot.addParticipant();

    slot.removeParticipant();

    expect(slot.isBooked).toBe(false);
    expect(slot.currentParticipants).toBe(0);
    expect(() => slot.removeParticipant()).toThrow('No participants to remove.');
  });

  it('should move the participant count one seat at a time', () => {
    const slot = createTestSlot(3);

    slot.addParticipant();
    slot.addParticipant();
    expect(slot.currentParticipants).toBe(2);
    expect(slot.isBooked).toBe(false);

    slot.addParticipant();
    expect(slot.isBooked).toBe(true);
    expect(() => slot.addParticipant()).toThrow('Slot is at maximum capacity.');

    slot.removeParticipant();
    expect(slot.currentParticipants).toBe(2);
    expect(slot.isBooked).toBe(false);
  });

  it('should book and release a single seat', () => {
    const slot = createTestSlot(2);
    slot.addParticipant();

    slot.markBooked();
    expect(slot.currentParticipants).toBe(2);
    expect(() => slot.markBooked()).toThrow('Slot is already booked.');

    slot.releaseBooking();
    expect(slot.currentParticipants).toBe(1);
    expect(() => slot.releaseBooking()).toThrow('Slot is not booked.');
  });

  it('should only be bookable while active, open and in the future', () => {
    const slot = createTestSlot(1);
    const before = new Date('2025-05-31T00:00:00Z');

    expect(slot.isBookable(before)).toBe(true);
    expect(slot.isBookable(new Date('2025-06-01T10:30:00Z'))).toBe(false);

    slot.deactivate();
    expect(slot.isBookable(before)).toBe(false);
  });

  it('should manage recurrence', () => {
    const slot = createTestSlot();

    expect(() => slot.setRecurring('')).toThrow('Recurring pattern cannot be empty.');
    slot.setRecurring('FREQ=WEEKLY;BYDAY=MO');
    expect(slot.recurringPattern).toBe('FREQ=WEEKLY;BYDAY=MO');

    slot.cancelRecurring();
    expect(slot.isRecurring).toBe(false);
    expect(slot.recurringPattern).toBeNull();
  });

  it('should detect overlapping ranges', () => {
    const slot = createTestSlot();

    expect(slot.overlaps(new Date('2025-06-01T11:00:00Z'), new Date('2025-06-01T12:00:00Z'))).toBe(
      true,
    );
    expect(slot.overlaps(end, new Date('2025-06-01T12:00:00Z'))).toBe(false);
  });
});
