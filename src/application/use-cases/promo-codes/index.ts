export * from './create-promo-code.use-case';
export * from './update-promo-code.use-case';
export * from './validate-promo-code.use-case';
export * from './get-promo-codes.use-case';
