export * from './create-payment.use-case';
export * from './settle-payment.use-case';
export * from './refund-payment.use-case';
export * from './get-payments.use-case';
