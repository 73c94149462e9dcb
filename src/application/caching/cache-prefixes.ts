/**
 * Cache prefixes used by cached queries and by `@InvalidatesCache` rules.
 * A prefix must not contain an underscore.
 */
export const CachePrefixes = {
  // Courses
  GetAllCourses: 'GetAllCourses',
  GetCourseById: 'GetCourseById',
  GetCoursesByInstructor: 'GetCoursesByInstructor',
  GetCoursesByCategory: 'GetCoursesByCategory',

  // Users
  GetAllUsers: 'GetAllUsers',
  GetUserById: 'GetUserById',
  GetUsersByRole: 'GetUsersByRole',

  // Enrollments
  GetEnrollments: 'GetEnrollments',
  GetEnrollmentsByUser: 'GetEnrollmentsByUser',
  GetEnrollmentsByCourse: 'GetEnrollmentsByCourse',

  // Bookings
  GetBookings: 'GetBookings',
  GetBookingsByUser: 'GetBookingsByUser',
  GetBookingsByInstructor: 'GetBookingsByInstructor',

  // Availability
  GetAvailabilitySlots: 'GetAvailabilitySlots',
  GetAvailabilitySlotsByInstructor: 'GetAvailabilitySlotsByInstructor',

  // Payments
  GetPayments: 'GetPayments',
  GetPaymentsByUser: 'GetPaymentsByUser',

  // Ratings
  GetCourseRatings: 'GetCourseRatings',
  GetInstructorRatings: 'GetInstructorRatings',

  // Notifications
  GetNotifications: 'GetNotifications',
  GetNotificationsByUser: 'GetNotificationsByUser',

  // Promo codes
  GetPromoCodes: 'GetPromoCodes',
} as const;

export type CachePrefix = (typeof CachePrefixes)[keyof typeof CachePrefixes];
