export { RefundPolicy } from './refund-policy.service';
