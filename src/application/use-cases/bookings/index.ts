export * from './create-booking.use-case';
export * from './confirm-booking.use-case';
export * from './cancel-booking.use-case';
export * from './change-booking-status.use-case';
export * from './reschedule-booking.use-case';
export * from './update-booking-notes.use-case';
export * from './get-bookings.use-case';
