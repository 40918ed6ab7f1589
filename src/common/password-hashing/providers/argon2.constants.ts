export const ARGON2_ALGORITHMS = ['argon2d', 'argon2i', 'argon2id'] as const;

export type Argon2Algorithm = (typeof ARGON2_ALGORITHMS)[number];

/** 0x13 is the current version, 0x10 is still accepted when reading older hashes. */
export const ARGON2_VERSIONS = [0x13, 0x10] as const;

const MAX_UINT32 = 2 ** 32 - 1;

export const ARGON2_LIMITS = {
	saltLength: { min: 8, max: 64 },
	hashLength: { min: 4, max: MAX_UINT32 },
	/** in KiB, also bounded below by 8 * parallelism */
	memoryCost: { min: 8, max: MAX_UINT32 },
	timeCost: { min: 1, max: MAX_UINT32 },
	parallelism: { min: 1, max: 2 ** 24 - 1 },
} as const;
