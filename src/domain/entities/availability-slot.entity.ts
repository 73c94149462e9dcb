import { AggregateRoot } from '../events';
import { BusinessRuleViolationException } from '../exceptions';
import { EntityId, Money } from '../value-objects';

export interface AvailabilitySlotProps {
  courseId: EntityId;
  instructorId: EntityId;
  startTime: Date;
  endTime: Date;
  price: Money;
  maxParticipants: number;
  currentParticipants: number;
  isBooked: boolean;
  isActive: boolean;
  notes: string | null;
  isRecurring: boolean;
  recurringPattern: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * A time window in which an instructor teaches a course session.
 * Tracks capacity; a slot is "booked" once it is full.
 */
export class AvailabilitySlot extends AggregateRoot {
  private constructor(id: EntityId, private readonly props: AvailabilitySlotProps) {
    super(id);
  }

  static create(params: {
    id?: EntityId;
    courseId: EntityId;
    instructorId: EntityId;
    startTime: Date;
    endTime: Date;
    price: Money;
    maxParticipants?: number;
    notes?: string | null;
  }): AvailabilitySlot {
    AvailabilitySlot.ensureTimeRange(params.startTime, params.endTime);
    const maxParticipants = params.maxParticipants ?? 1;
    if (!Number.isInteger(maxParticipants) || maxParticipants <= 0) {
      throw new BusinessRuleViolationException('Max participants must be positive.');
    }

    const now = new Date();
    const slot = new AvailabilitySlot(params.id ?? EntityId.generate(), {
      courseId: params.courseId,
      instructorId: params.instructorId,
      startTime: params.startTime,
      endTime: params.endTime,
      price: params.price,
      maxParticipants,
      currentParticipants: 0,
      isBooked: false,
      isActive: true,
      notes: params.notes ?? null,
      isRecurring: false,
      recurringPattern: null,
      createdAt: now,
      updatedAt: now,
    });
    slot.record('AvailabilitySlotCreated', {
      courseId: params.courseId.toString(),
      startTime: params.startTime.toISOString(),
    });
    return slot;
  }

  static reconstitute(id: EntityId, props: AvailabilitySlotProps): AvailabilitySlot {
    return new AvailabilitySlot(id, { ...props });
  }

  get courseId(): EntityId {
    return this.props.courseId;
  }

  get instructorId(): EntityId {
    return this.props.instructorId;
  }

  get startTime(): Date {
    return this.props.startTime;
  }

  get endTime(): Date {
    return this.props.endTime;
  }

  get price(): Money {
    return this.props.price;
  }

  get maxParticipants(): number {
    return this.props.maxParticipants;
  }

  get currentParticipants(): number {
    return this.props.currentParticipants;
  }

  get isBooked(): boolean {
    return this.props.isBooked;
  }

  get isActive(): boolean {
    return this.props.isActive;
  }

  get notes(): string | null {
    return this.props.notes;
  }

  get isRecurring(): boolean {
    return this.props.isRecurring;
  }

  get recurringPattern(): string | null {
    return this.props.recurringPattern;
  }

  get createdAt(): Date {
    return this.props.createdAt;
  }

  get updatedAt(): Date {
    return this.props.updatedAt;
  }

  // Calculated property: seats still free
  get remainingCapacity(): number {
    return Math.max(this.props.maxParticipants - this.props.currentParticipants, 0);
  }

  get durationMinutes(): number {
    return Math.round((this.props.endTime.getTime() - this.props.startTime.getTime()) / 60000);
  }

  hasAvailableCapacity(): boolean {
    return this.props.currentParticipants < this.props.maxParticipants;
  }

  isAtFullCapacity(): boolean {
    return this.props.currentParticipants >= this.props.maxParticipants;
  }

  // Open for a new booking right now
  isBookable(now: Date = new Date()): boolean {
    return (
      this.props.isActive &&
      this.hasAvailableCapacity() &&
      this.props.startTime.getTime() > now.getTime()
    );
  }

  overlaps(start: Date, end: Date): boolean {
    return (
      this.props.startTime.getTime() < end.getTime() &&
      start.getTime() < this.props.endTime.getTime()
    );
  }

  // Business logic: take one seat; the slot is booked when the last seat goes
  addParticipant(): void {
    if (this.isAtFullCapacity()) {
      throw new BusinessRuleViolationException('Slot is at maximum capacity.');
    }

    this.props.currentParticipants += 1;
    this.props.isBooked = this.isAtFullCapacity();
    this.touch();
    this.record('AvailabilitySlotParticipantAdded', {
      currentParticipants: this.props.currentParticipants,
    });
  }

  removeParticipant(): void {
    if (this.props.currentParticipants <= 0) {
      throw new BusinessRuleViolationException('No participants to remove.');
    }

    this.props.currentParticipants -= 1;
    this.props.isBooked = false;
    this.touch();
    this.record('AvailabilitySlotParticipantRemoved', {
      currentParticipants: this.props.currentParticipants,
    });
  }

  markBooked(): void {
    if (this.props.isBooked) {
      throw new BusinessRuleViolationException('Slot is already booked.');
    }
    this.addParticipant();
  }

  releaseBooking(): void {
    if (!this.props.isBooked) {
      throw new BusinessRuleViolationException('Slot is not booked.');
    }
    this.removeParticipant();
  }

  updateTime(startTime: Date, endTime: Date): void {
    AvailabilitySlot.ensureTimeRange(startTime, endTime);
    this.props.startTime = startTime;
    this.props.endTime = endTime;
    this.touch();
    this.record('AvailabilitySlotUpdated', { startTime: startTime.toISOString() });
  }

  updatePrice(price: Money): void {
    this.props.price = price;
    this.touch();
  }

  updateMaxParticipants(maxParticipants: number): void {
    if (!Number.isInteger(maxParticipants) || maxParticipants <= 0) {
      throw new BusinessRuleViolationException('Max participants must be positive.');
    }
    if (maxParticipants < this.props.currentParticipants) {
      throw new BusinessRuleViolationException(
        'Max participants cannot be lower than current participants.',
      );
    }
    this.props.maxParticipants = maxParticipants;
    this.props.isBooked = this.isAtFullCapacity();
    this.touch();
  }

  updateNotes(notes: string | null): void {
    this.props.notes = notes;
    this.touch();
  }

  setRecurring(pattern: string): void {
    if (!pattern || pattern.trim().length === 0) {
      throw new BusinessRuleViolationException('Recurring pattern cannot be empty.');
    }
    this.props.isRecurring = true;
    this.props.recurringPattern = pattern.trim();
    this.touch();
  }

  cancelRecurring(): void {
    this.props.isRecurring = false;
    this.props.recurringPattern = null;
    this.touch();
  }

  activate(): void {
    if (this.props.isActive) {
      throw new BusinessRuleViolationException('Slot is already active.');
    }
    this.props.isActive = true;
    this.touch();
  }

  deactivate(): void {
    if (!this.props.isActive) {
      throw new BusinessRuleViolationException('Slot is already inactive.');
    }
    this.props.isActive = false;
    this.touch();
    this.record('AvailabilitySlotDeactivated');
  }

  private static ensureTimeRange(start: Date, end: Date): void {
    if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime())) {
      throw new BusinessRuleViolationException('Start and end time must be valid dates.');
    }
    if (end.getTime() <= start.getTime()) {
      throw new BusinessRuleViolationException('End time must be after start time.');
    }
  }

  private touch(): void {
    this.props.updatedAt = new Date();
  }
}
