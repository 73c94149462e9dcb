import { CachePrefixes } from '../../caching';

export const SLOT_QUERY_PREFIXES = [
  CachePrefixes.GetAvailabilitySlots,
  CachePrefixes.GetAvailabilitySlotsByInstructor,
];
