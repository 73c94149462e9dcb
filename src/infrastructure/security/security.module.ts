import { Global, Module } from '@nestjs/common';
import { EnvConfigService } from '@infrastructure/config';
import { BcryptPasswordHasher } from './bcrypt-password-hasher';

@Global()
@Module({
  providers: [
    {
      provide: 'IPasswordHasher',
      useFactory: (envConfig: EnvConfigService) => new BcryptPasswordHasher(envConfig.bcryptRounds),
      inject: [EnvConfigService],
    },
  ],
  exports: ['IPasswordHasher'],
})
export class SecurityModule {}
