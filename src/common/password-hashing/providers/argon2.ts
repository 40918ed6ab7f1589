import { Inject, Injectable, Logger } from '@nestjs/common';
import * as argon2 from 'argon2';
import { Argon2Config, argon2ConfigRegistration } from '../../../config/argon2.config';
import { HashingOptions } from '../hashing-options';
import { BackendError, EncodedHashDescription, HashingParameters, PasswordHashingProvider } from '../password-hashing-provider.interface';
import { parseArgon2PhcString } from './argon2-phc';
import { ARGON2_LIMITS, Argon2Algorithm } from './argon2.constants';

const ARGON2_TYPES: Record<Argon2Algorithm, typeof argon2.argon2d | typeof argon2.argon2i | typeof argon2.argon2id> = {
	argon2d: argon2.argon2d,
	argon2i: argon2.argon2i,
	argon2id: argon2.argon2id,
};

@Injectable()
export class Argon2Service implements PasswordHashingProvider {
	public readonly minimumSaltLength = ARGON2_LIMITS.saltLength.min;
	public readonly maximumSaltLength = ARGON2_LIMITS.saltLength.max;

	private readonly logger = new Logger(Argon2Service.name);

	constructor(@Inject(argon2ConfigRegistration.KEY) private readonly argon2Config: Argon2Config) {}

	async encodeHash(password: Buffer, salt: Buffer, options?: HashingOptions): Promise<string> {
		const parameters = this.resolveParameters(options);
		this.assertParameters(parameters);
		this.logger.debug(
			`hashing with ${this.argon2Config.algorithm} m=${parameters.memoryCost},t=${parameters.timeCost},p=${parameters.parallelism}`,
		);
		return argon2.hash(password, {
			type: ARGON2_TYPES[this.argon2Config.algorithm],
			salt,
			...parameters,
		});
	}

	async verifyEncoded(digest: string, password: Buffer): Promise<boolean> {
		// argon2.verify resolves false for ids it does not know, those must be reported instead
		parseArgon2PhcString(digest);
		return argon2.verify(digest, password);
	}

	describe(digest: string): EncodedHashDescription {
		const parsed = parseArgon2PhcString(digest);
		return {
			algorithm: parsed.algorithm,
			version: parsed.version,
			parameters: {
				memoryCost: parsed.memoryCost,
				timeCost: parsed.timeCost,
				parallelism: parsed.parallelism,
				hashLength: parsed.hash.length,
			},
		};
	}

	private assertParameters(parameters: HashingParameters) {
		const keys = ['memoryCost', 'timeCost', 'parallelism', 'hashLength'] as const;
		for (const key of keys) {
			const { min, max } = ARGON2_LIMITS[key];
			if (parameters[key] < min || parameters[key] > max) {
				throw new BackendError('invalid-options', `${key} must be between ${min} and ${max}, got ${parameters[key]}`);
			}
		}
		if (parameters.memoryCost < 8 * parameters.parallelism) {
			throw new BackendError('invalid-options', `memoryCost must be at least 8 KiB per lane (${8 * parameters.parallelism} KiB)`);
		}
	}

	private resolveParameters(options?: HashingOptions): HashingParameters {
		return {
			memoryCost: options?.memoryCost ?? this.argon2Config.memoryCost,
			timeCost: options?.timeCost ?? this.argon2Config.timeCost,
			parallelism: options?.parallelism ?? this.argon2Config.parallelism,
			hashLength: options?.hashLength ?? this.argon2Config.hashLength,
		};
	}
}
