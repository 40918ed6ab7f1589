import 'reflect-metadata';

export { Password, Plain, Hashed, PasswordState, PlainPassword, HashedPassword } from './common/password/password';
export { ToPlainPassword, IsPlainPassword, IS_PLAIN_PASSWORD } from './common/password/password.decorators';
export { PasswordHashingService, Salt, DEFAULT_SALT_LENGTH } from './common/password-hashing/password-hashing.service';
export { PasswordHashingModule } from './common/password-hashing/password-hashing.module';
export {
	PasswordHashingProvider,
	BackendError,
	BackendErrorCode,
	EncodedHashDescription,
	HashingParameters,
} from './common/password-hashing/password-hashing-provider.interface';
export { HashingOptions } from './common/password-hashing/hashing-options';
export { HashError, VerifyError, PasswordHashingError, HashErrorReason, VerifyErrorReason } from './common/password-hashing/password-hashing.errors';
export { Argon2Service } from './common/password-hashing/providers/argon2';
export { ARGON2_ALGORITHMS, ARGON2_LIMITS, Argon2Algorithm } from './common/password-hashing/providers/argon2.constants';
export { Argon2Config, Argon2ConfigEnvironmentVariables, argon2ConfigRegistration, ARGON2_CONFIG_KEY } from './config/argon2.config';
