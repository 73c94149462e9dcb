import { CachePrefixes } from '../../caching';

export const USER_QUERY_PREFIXES = [
  CachePrefixes.GetAllUsers,
  CachePrefixes.GetUserById,
  CachePrefixes.GetUsersByRole,
];
