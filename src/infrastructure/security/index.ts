export { BcryptPasswordHasher } from './bcrypt-password-hasher';
export { SecurityModule } from './security.module';
