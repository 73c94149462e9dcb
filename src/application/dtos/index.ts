export * from './course.dto';
export * from './user.dto';
export * from './availability-slot.dto';
export * from './booking.dto';
export * from './payment.dto';
export * from './enrollment.dto';
export * from './rating.dto';
export * from './notification.dto';
export * from './promo-code.dto';
export * from './audit-log.dto';
