export * from './courses';
export * from './users';
export * from './availability-slots';
export * from './bookings';
export * from './payments';
export * from './enrollments';
export * from './ratings';
export * from './notifications';
export * from './promo-codes';
export * from './audit-logs';
