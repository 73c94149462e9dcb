export * from './course-material.dto';
export * from './create-course.dto';
export * from './update-course.dto';
export * from './reorder-materials.dto';
export * from './course-query.dto';
export * from './create-user.dto';
export * from './update-user-profile.dto';
export * from './user-query.dto';
export * from './auth.dto';
export * from './availability-slot.dto';
export * from './booking.dto';
export * from './payment.dto';
export * from './enrollment.dto';
export * from './rating.dto';
export * from './promo-code.dto';
export * from './flags-query.dto';
