import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { registerAs } from '@nestjs/config';

export type ConfigClass<V, C> = new (config: V) => C;

export function validateConfig<V extends object>(envVariablesClass: ClassConstructor<V>, env: NodeJS.ProcessEnv = process.env): V {
	const validatedConfig = plainToInstance(envVariablesClass, env, { enableImplicitConversion: true });
	const errors = validateSync(validatedConfig, { skipMissingProperties: false });

	if (errors.length > 0) {
		throw new Error(errors.toString());
	}
	return validatedConfig;
}

export function createConfigRegistration<V extends object, C extends object>(configKey: string, ConfigClass: ConfigClass<V, C>, envVariablesClass: ClassConstructor<V>) {
	return registerAs(configKey, () => {
		const config = validateConfig(envVariablesClass);
		return new ConfigClass(config);
	});
}
