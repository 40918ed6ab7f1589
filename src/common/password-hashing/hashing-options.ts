import { IsInt, IsOptional, Min } from 'class-validator';

/**
 * Cost parameters for a single call. Omitted fields fall back to the backend's configured defaults.
 * Only checked for being positive integers here, each backend enforces its own ranges.
 */
export class HashingOptions {
	/** in KiB */
	@IsOptional()
	@IsInt()
	@Min(1)
	readonly memoryCost?: number;

	/** number of passes over the memory */
	@IsOptional()
	@IsInt()
	@Min(1)
	readonly timeCost?: number;

	@IsOptional()
	@IsInt()
	@Min(1)
	readonly parallelism?: number;

	/** digest length in bytes */
	@IsOptional()
	@IsInt()
	@Min(1)
	readonly hashLength?: number;
}
