export type HashErrorReason = 'invalid-salt' | 'invalid-options' | 'backend-failure';
export type VerifyErrorReason = 'malformed-hash' | 'unsupported-hash' | 'invalid-options' | 'backend-failure';

export abstract class PasswordHashingError extends Error {
	abstract readonly reason: string;
}

/** A password could not be hashed. Retrying with the same input fails the same way. */
export class HashError extends PasswordHashingError {
	constructor(
		public readonly reason: HashErrorReason,
		message: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = 'HashError';
	}
}

/**
 * The stored hash could not be checked at all, usually corrupted data.
 * A wrong password is not an error: `verify` resolves `false` for it.
 */
export class VerifyError extends PasswordHashingError {
	constructor(
		public readonly reason: VerifyErrorReason,
		message: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = 'VerifyError';
	}
}
