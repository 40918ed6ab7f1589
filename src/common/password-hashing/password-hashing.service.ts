import { Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { randomBytes } from 'node:crypto';
import { Hashed, Password, Plain, issueHashedPassword } from '../password/password';
import { HashingOptions } from './hashing-options';
import { BackendError, EncodedHashDescription, PasswordHashingProvider } from './password-hashing-provider.interface';
import { HashError, VerifyError } from './password-hashing.errors';

/** Raw salt bytes, or a string taken as its UTF-8 bytes. */
export type Salt = string | Uint8Array;

export const DEFAULT_SALT_LENGTH = 16;

/**
 * The only two legal transitions of a password: plain to hashed, and checking a plain
 * candidate against a hash. The cryptography itself is left to the provider.
 */
export class PasswordHashingService {
	private readonly logger = new Logger(PasswordHashingService.name);

	constructor(private readonly hashingProvider: PasswordHashingProvider) {}

	async hash(plain: Password<Plain>, salt: Salt, options?: HashingOptions): Promise<Password<Hashed>> {
		const saltBytes = typeof salt === 'string' ? Buffer.from(salt, 'utf8') : Buffer.from(salt);
		this.assertSaltLength(saltBytes.length);
		const optionsError = this.validateOptions(options);
		if (optionsError) {
			throw new HashError('invalid-options', optionsError);
		}
		const encoded = await this.hashingProvider.encodeHash(plain.exposeBytes(), saltBytes, options).catch((err: unknown) => {
			const error = this.toHashError(err);
			this.logger.warn(`hashing failed (${error.reason}): ${error.message}`);
			throw error;
		});
		return issueHashedPassword(encoded);
	}

	async verify(hashed: Password<Hashed>, candidate: Password<Plain>, options?: HashingOptions): Promise<boolean> {
		const optionsError = this.validateOptions(options);
		if (optionsError) {
			throw new VerifyError('invalid-options', optionsError);
		}
		const digest = hashed.exposeSecret();
		try {
			if (options) {
				this.reportParameterMismatch(digest, options);
			}
			return await this.hashingProvider.verifyEncoded(digest, candidate.exposeBytes());
		} catch (err) {
			const error = this.toVerifyError(err);
			this.logger.warn(`verification failed (${error.reason}): ${error.message}`);
			throw error;
		}
	}

	/**
	 * Wraps an encoding read back from storage. Throws {@link VerifyError} when the
	 * provider cannot read it, so a corrupted value is caught before it is used.
	 */
	restore(encoded: string): Password<Hashed> {
		this.describe(encoded);
		return issueHashedPassword(encoded);
	}

	/** Random salt for callers that do not bring their own. Never used implicitly. */
	generateSalt(length: number = DEFAULT_SALT_LENGTH): Buffer {
		this.assertSaltLength(length);
		return randomBytes(length);
	}

	private assertSaltLength(length: number) {
		const { minimumSaltLength, maximumSaltLength } = this.hashingProvider;
		if (!Number.isInteger(length) || length < minimumSaltLength || length > maximumSaltLength) {
			throw new HashError('invalid-salt', `salt must be between ${minimumSaltLength} and ${maximumSaltLength} bytes, got ${length}`);
		}
	}

	private validateOptions(options?: HashingOptions): string | null {
		if (!options) {
			return null;
		}
		const errors = validateSync(plainToInstance(HashingOptions, options), { whitelist: true, forbidNonWhitelisted: true });
		if (errors.length === 0) {
			return null;
		}
		const messages = errors.flatMap((error) => Object.values(error.constraints ?? {}));
		return `invalid hashing options: ${messages.join('; ')}`;
	}

	/** Parameters are always read from the encoding; a mismatch only means the caller expected other ones. */
	private reportParameterMismatch(digest: string, options: HashingOptions) {
		const encodedParameters = this.describe(digest).parameters;
		const keys = ['memoryCost', 'timeCost', 'parallelism', 'hashLength'] as const;
		const mismatched = keys.filter((key) => options[key] !== undefined && options[key] !== encodedParameters[key]);
		if (mismatched.length > 0) {
			this.logger.debug(`stored hash was created with different ${mismatched.join(', ')}`);
		}
	}

	private describe(digest: string): EncodedHashDescription {
		try {
			return this.hashingProvider.describe(digest);
		} catch (err) {
			throw this.toVerifyError(err);
		}
	}

	private toHashError(err: unknown): HashError {
		if (err instanceof HashError) {
			return err;
		}
		if (err instanceof BackendError && (err.code === 'invalid-salt' || err.code === 'invalid-options')) {
			return new HashError(err.code, err.message, { cause: err });
		}
		return new HashError('backend-failure', 'the hashing backend failed', { cause: err });
	}

	private toVerifyError(err: unknown): VerifyError {
		if (err instanceof VerifyError) {
			return err;
		}
		if (err instanceof BackendError && (err.code === 'malformed-hash' || err.code === 'unsupported-hash')) {
			return new VerifyError(err.code, err.message, { cause: err });
		}
		return new VerifyError('backend-failure', 'the hashing backend failed', { cause: err });
	}
}
