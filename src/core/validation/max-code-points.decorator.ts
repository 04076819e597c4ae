import { ValidateBy, ValidationOptions, buildMessage } from 'class-validator';

export const MAX_CODE_POINTS = 'maxCodePoints';

/**
 * Checks a string's length in Unicode code points, so a surrogate
 * pair counts as one character.
 */
export function MaxCodePoints(
  max: number,
  validationOptions?: ValidationOptions,
): PropertyDecorator {
  return ValidateBy(
    {
      name: MAX_CODE_POINTS,
      constraints: [max],
      validator: {
        validate: (value: unknown): boolean =>
          typeof value === 'string' && [...value].length <= max,
        defaultMessage: buildMessage(
          (eachPrefix) =>
            `${eachPrefix}$property must be at most $constraint1 characters`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}
