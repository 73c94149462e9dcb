export * from './get-notifications-by-user.use-case';
export * from './mark-notification-read.use-case';
