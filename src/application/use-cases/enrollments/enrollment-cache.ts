import { CachePrefixes } from '../../caching';

export const ENROLLMENT_QUERY_PREFIXES = [
  CachePrefixes.GetEnrollments,
  CachePrefixes.GetEnrollmentsByUser,
  CachePrefixes.GetEnrollmentsByCourse,
];
