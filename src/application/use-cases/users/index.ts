export * from './auth-options';
export * from './create-user.use-case';
export * from './confirm-email.use-case';
export * from './change-password.use-case';
export * from './request-password-reset.use-case';
export * from './reset-password.use-case';
export * from './authenticate-user.use-case';
export * from './update-user-profile.use-case';
export * from './change-user-status.use-case';
export * from './get-user-by-id.use-case';
export * from './get-users.use-case';
