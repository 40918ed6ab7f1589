import { Transform } from 'class-transformer';
import { ValidateBy, ValidationArguments, ValidationOptions } from 'class-validator';
import { Password } from './password';

export const IS_PLAIN_PASSWORD = 'isPlainPassword';

/** Turns an incoming string into a `Password<Plain>`; anything else is left for validation to reject. */
export function ToPlainPassword(): PropertyDecorator {
	return Transform(({ value }) => (typeof value === 'string' ? Password.plain(value) : value));
}

/**
 * Checks that the property holds a password built by {@link ToPlainPassword}.
 * Must be paired with it, the check itself cannot tell the states apart at run time.
 */
export function IsPlainPassword(validationOptions?: ValidationOptions): PropertyDecorator {
	return ValidateBy(
		{
			name: IS_PLAIN_PASSWORD,
			validator: {
				validate: (value: unknown) => value instanceof Password,
				defaultMessage: (args?: ValidationArguments) =>
					args?.value === undefined || args.value === null ? 'a password must have a value' : 'a password must be a string',
			},
		},
		validationOptions,
	);
}
