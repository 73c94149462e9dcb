export * from './enroll-student.use-case';
export * from './update-enrollment-progress.use-case';
export * from './complete-course-material.use-case';
export * from './change-enrollment-status.use-case';
export * from './get-enrollments.use-case';
