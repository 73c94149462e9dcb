export * from './course-material.input';
export * from './create-course.use-case';
export * from './update-course.use-case';
export * from './change-course-state.use-case';
export * from './reorder-course-materials.use-case';
export * from './get-all-courses.use-case';
export * from './get-course-by-id.use-case';
export * from './get-courses-by-instructor.use-case';
