import { CachePrefixes } from '../../caching';

export const BOOKING_QUERY_PREFIXES = [
  CachePrefixes.GetBookings,
  CachePrefixes.GetBookingsByUser,
  CachePrefixes.GetBookingsByInstructor,
];

export const SLOT_AVAILABILITY_PREFIXES = [
  CachePrefixes.GetAvailabilitySlots,
  CachePrefixes.GetAvailabilitySlotsByInstructor,
];
