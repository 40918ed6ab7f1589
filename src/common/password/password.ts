import { timingSafeEqual } from 'node:crypto';
import { inspect } from 'node:util';

declare const plainMarker: unique symbol;
declare const hashedMarker: unique symbol;

/**
 * Marks a password whose content never went through a hash function.
 *
 * Only exists at the type level, no value of this type can be created.
 */
export interface Plain {
	readonly [plainMarker]: true;
}

/**
 * Marks a password that holds the encoded output of a hashing backend.
 *
 * Only exists at the type level, no value of this type can be created.
 */
export interface Hashed {
	readonly [hashedMarker]: true;
}

export type PasswordState = Plain | Hashed;

const constructionKey = Symbol('Password');
const passwordState = Symbol('passwordState');

const REDACTED = 'Password(<redacted>)';

/**
 * A password together with a compile-time claim about whether it has been hashed.
 *
 * `Password<Plain>` and `Password<Hashed>` are not assignable to each other, so a plain
 * password can never reach code that expects a hash (storage, logs) and a hash can never
 * be hashed again. The state only lives in the type; at run time both are the same object.
 */
export class Password<S extends PasswordState> {
	/** Type-level only, never assigned. */
	declare readonly [passwordState]: S;

	private readonly content: Buffer;

	/** Not callable from outside this module, see {@link Password.plain}. */
	constructor(key: typeof constructionKey, content: Uint8Array) {
		if (key !== constructionKey) {
			throw new TypeError('Password instances are created with Password.plain()');
		}
		this.content = Buffer.from(content);
	}

	/**
	 * Wraps raw user input. Strings are stored as UTF-8, byte arrays are copied verbatim
	 * (invalid UTF-8 included).
	 */
	static plain(raw: string | Uint8Array): Password<Plain> {
		const bytes = typeof raw === 'string' ? Buffer.from(raw, 'utf8') : raw;
		return new Password<Plain>(constructionKey, bytes);
	}

	/** Copy of the underlying bytes, whatever the state. */
	exposeBytes(): Buffer {
		return Buffer.from(this.content);
	}

	/** The content decoded as UTF-8. For a hashed password, this is the encoded hash to persist. */
	exposeSecret(): string {
		return this.content.toString('utf8');
	}

	/**
	 * Constant-time comparison with a password in the same state. The receiver must have a
	 * concrete state, a `Password<PasswordState>` cannot be compared.
	 */
	equals(this: Password<Plain>, other: Password<Plain>): boolean;
	equals(this: Password<Hashed>, other: Password<Hashed>): boolean;
	equals(other: Password<PasswordState>): boolean {
		if (this.content.length !== other.content.length) {
			return false;
		}
		return timingSafeEqual(this.content, other.content);
	}

	toString(): string {
		return REDACTED;
	}

	toJSON(): string {
		return REDACTED;
	}

	[inspect.custom](): string {
		return REDACTED;
	}
}

export type PlainPassword = Password<Plain>;
export type HashedPassword = Password<Hashed>;

/**
 * Seals a backend encoding into a hashed password.
 *
 * @internal only the hashing service calls this; it is not part of the package exports.
 */
export function issueHashedPassword(encoded: string): Password<Hashed> {
	return new Password<Hashed>(constructionKey, Buffer.from(encoded, 'utf8'));
}
