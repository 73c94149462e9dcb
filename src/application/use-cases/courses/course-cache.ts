import { CachePrefixes } from '../../caching';

// Every cached course listing and lookup
export const COURSE_QUERY_PREFIXES = [
  CachePrefixes.GetAllCourses,
  CachePrefixes.GetCourseById,
  CachePrefixes.GetCoursesByInstructor,
  CachePrefixes.GetCoursesByCategory,
];
