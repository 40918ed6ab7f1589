import { DynamicModule, Global, Module, Type } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { argon2ConfigRegistration } from '../../config/argon2.config';
import { PasswordHashingProvider } from './password-hashing-provider.interface';
import { PasswordHashingService } from './password-hashing.service';
import { Argon2Service } from './providers/argon2';

const passwordHashService = {
	provide: PasswordHashingService,
	useFactory: (passwordHashingProvider: PasswordHashingProvider) => {
		return new PasswordHashingService(passwordHashingProvider);
	},
	inject: [PasswordHashingProvider],
};

@Global()
@Module({
	imports: [ConfigModule.forFeature(argon2ConfigRegistration)],
	providers: [{ provide: PasswordHashingProvider, useClass: Argon2Service }, passwordHashService],
	exports: [passwordHashService],
})
export class PasswordHashingModule {
	/** Swaps the default argon2 backend for another one. */
	static withProvider(provider: Type<PasswordHashingProvider>): DynamicModule {
		return {
			module: PasswordHashingModule,
			providers: [{ provide: PasswordHashingProvider, useClass: provider }, passwordHashService],
			exports: [passwordHashService],
		};
	}
}
