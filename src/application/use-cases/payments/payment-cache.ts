import { CachePrefixes } from '../../caching';

export const PAYMENT_QUERY_PREFIXES = [CachePrefixes.GetPayments, CachePrefixes.GetPaymentsByUser];
