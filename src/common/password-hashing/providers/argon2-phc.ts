import { BackendError } from '../password-hashing-provider.interface';
import { ARGON2_ALGORITHMS, ARGON2_LIMITS, ARGON2_VERSIONS, Argon2Algorithm } from './argon2.constants';

export interface Argon2PhcString {
	algorithm: Argon2Algorithm;
	version: number;
	memoryCost: number;
	timeCost: number;
	parallelism: number;
	salt: Buffer;
	hash: Buffer;
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]+$/;
const VERSION_PATTERN = /^v=(\d+)$/;
const PARAMETER_PATTERN = /^([a-z])=(\d+)$/;

/**
 * Parses `$<id>$v=<version>$m=<m>,t=<t>,p=<p>$<salt>$<hash>`, the encoding written by argon2.
 *
 * Stricter than the argon2 package itself: an unreadable encoding or an unknown id must be
 * reported, not verified as a mismatch. A digest cut to a multiple of 4 characters is still
 * canonical base64 of a shorter hash and cannot be told apart from one, so it parses.
 */
export function parseArgon2PhcString(digest: string): Argon2PhcString {
	const segments = digest.split('$');
	if (segments.length < 2 || segments[0] !== '') {
		throw new BackendError('malformed-hash', 'encoded hash must start with "$<algorithm>"');
	}
	const algorithm = ARGON2_ALGORITHMS.find((id) => id === segments[1]);
	if (!algorithm) {
		throw new BackendError('unsupported-hash', `unsupported algorithm "${segments[1]}"`);
	}
	if (segments.length !== 6) {
		throw new BackendError('malformed-hash', `encoded hash must have 5 fields, got ${segments.length - 1}`);
	}
	const [, , versionField, parametersField, saltField, hashField] = segments;

	const version = parseVersion(versionField);
	const parameters = parseParameters(parametersField);
	const salt = decodeBase64Field('salt', saltField);
	const hash = decodeBase64Field('hash', hashField);

	if (salt.length < ARGON2_LIMITS.saltLength.min) {
		throw new BackendError('malformed-hash', `salt must be at least ${ARGON2_LIMITS.saltLength.min} bytes`);
	}
	if (hash.length < ARGON2_LIMITS.hashLength.min) {
		throw new BackendError('malformed-hash', `hash must be at least ${ARGON2_LIMITS.hashLength.min} bytes`);
	}
	return { algorithm, version, ...parameters, salt, hash };
}

function parseVersion(field: string): number {
	const match = VERSION_PATTERN.exec(field);
	if (!match) {
		throw new BackendError('malformed-hash', `invalid version field "${field}"`);
	}
	const version = Number(match[1]);
	if (!ARGON2_VERSIONS.some((supported) => supported === version)) {
		throw new BackendError('unsupported-hash', `unsupported argon2 version ${version}`);
	}
	return version;
}

function parseParameters(field: string): Pick<Argon2PhcString, 'memoryCost' | 'timeCost' | 'parallelism'> {
	const values = new Map<string, number>();
	for (const pair of field.split(',')) {
		const match = PARAMETER_PATTERN.exec(pair);
		if (!match || values.has(match[1])) {
			throw new BackendError('malformed-hash', `invalid parameter "${pair}"`);
		}
		values.set(match[1], Number(match[2]));
	}
	const memoryCost = values.get('m');
	const timeCost = values.get('t');
	const parallelism = values.get('p');
	if (memoryCost === undefined || timeCost === undefined || parallelism === undefined || values.size !== 3) {
		throw new BackendError('malformed-hash', 'parameters must be exactly m, t and p');
	}
	return { memoryCost, timeCost, parallelism };
}

function decodeBase64Field(name: string, field: string): Buffer {
	if (!BASE64_PATTERN.test(field)) {
		throw new BackendError('malformed-hash', `${name} is not unpadded base64`);
	}
	const bytes = Buffer.from(field, 'base64');
	// Buffer silently drops trailing characters that do not complete a byte
	if (bytes.toString('base64').replace(/=+$/, '') !== field) {
		throw new BackendError('malformed-hash', `${name} is not canonical base64`);
	}
	return bytes;
}
