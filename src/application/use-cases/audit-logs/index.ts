export * from './get-audit-logs.use-case';
