import { IsIn, IsInt, IsOptional, Max, Min } from 'class-validator';
import { createConfigRegistration } from './config-factory';
import { ARGON2_ALGORITHMS, ARGON2_LIMITS, Argon2Algorithm } from '../common/password-hashing/providers/argon2.constants';

export const ARGON2_CONFIG_KEY = 'argon2';

export class Argon2ConfigEnvironmentVariables {
	@IsOptional()
	@IsIn(ARGON2_ALGORITHMS)
	readonly ARGON2_TYPE?: Argon2Algorithm;

	@IsOptional()
	@IsInt()
	@Min(ARGON2_LIMITS.memoryCost.min)
	@Max(ARGON2_LIMITS.memoryCost.max)
	/**In KiB*/
	readonly ARGON2_MEMORY_COST?: number;

	@IsOptional()
	@IsInt()
	@Min(ARGON2_LIMITS.timeCost.min)
	@Max(ARGON2_LIMITS.timeCost.max)
	readonly ARGON2_TIME_COST?: number;

	@IsOptional()
	@IsInt()
	@Min(ARGON2_LIMITS.parallelism.min)
	@Max(ARGON2_LIMITS.parallelism.max)
	readonly ARGON2_PARALLELISM?: number;

	@IsOptional()
	@IsInt()
	@Min(ARGON2_LIMITS.hashLength.min)
	@Max(ARGON2_LIMITS.hashLength.max)
	readonly ARGON2_HASH_LENGTH?: number;
}

export class Argon2Config {
	public readonly algorithm: Argon2Algorithm;
	public readonly memoryCost: number;
	public readonly timeCost: number;
	public readonly parallelism: number;
	public readonly hashLength: number;

	constructor(config: Argon2ConfigEnvironmentVariables) {
		this.algorithm = config.ARGON2_TYPE ?? 'argon2id';
		this.memoryCost = config.ARGON2_MEMORY_COST ?? 64 * 1024; // 64 MiB
		this.timeCost = config.ARGON2_TIME_COST ?? 3;
		this.parallelism = config.ARGON2_PARALLELISM ?? 4;
		this.hashLength = config.ARGON2_HASH_LENGTH ?? 32;
	}
}

export const argon2ConfigRegistration = createConfigRegistration(ARGON2_CONFIG_KEY, Argon2Config, Argon2ConfigEnvironmentVariables);
