import { HashingOptions } from './hashing-options';

export type HashingParameters = Required<Pick<HashingOptions, 'memoryCost' | 'timeCost' | 'parallelism' | 'hashLength'>>;

/** What a backend can tell about one of its encodings without the password. */
export interface EncodedHashDescription {
	algorithm: string;
	version: number;
	parameters: HashingParameters;
}

export type BackendErrorCode = 'invalid-salt' | 'invalid-options' | 'malformed-hash' | 'unsupported-hash';

/** Thrown by a backend when the input is at fault, as opposed to the computation itself failing. */
export class BackendError extends Error {
	constructor(
		public readonly code: BackendErrorCode,
		message: string,
	) {
		super(message);
		this.name = 'BackendError';
	}
}

/**
 * Hashing backend the password service delegates to.
 *
 * Encodings must be self-describing (algorithm, version, parameters, salt and digest) so that
 * verification needs nothing but the encoding and the candidate password.
 */
export abstract class PasswordHashingProvider {
	abstract readonly minimumSaltLength: number;
	abstract readonly maximumSaltLength: number;

	abstract encodeHash(password: Buffer, salt: Buffer, options?: HashingOptions): Promise<string>;

	/** Resolves `false` on a mismatch, rejects when the encoding cannot be read. */
	abstract verifyEncoded(digest: string, password: Buffer): Promise<boolean>;

	/** Throws a {@link BackendError} when the encoding is malformed or not supported. */
	abstract describe(digest: string): EncodedHashDescription;
}
