export * from './rate-course.use-case';
export * from './rate-instructor.use-case';
export * from './get-ratings.use-case';
