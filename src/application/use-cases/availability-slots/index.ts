export * from './create-availability-slot.use-case';
export * from './update-availability-slot.use-case';
export * from './change-availability-slot.use-case';
export * from './get-availability-slots.use-case';
