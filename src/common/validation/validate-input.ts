import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';

import { InvalidArgumentException } from '../exceptions/invalid-argument.exception';

export function collectViolations(errors: ValidationError[]): string[] {
  return errors.flatMap((error) => [
    ...Object.values(error.constraints ?? {}),
    ...collectViolations(error.children ?? []),
  ]);
}

/*
Same rules as a whitelisting ValidationPipe, for callers that sit outside HTTP
*/
export async function validateInput<T extends object>(
  schema: ClassConstructor<T>,
  input: object,
): Promise<T> {
  const instance = plainToInstance(schema, input);
  const errors = await validate(instance, {
    whitelist: true,
    forbidNonWhitelisted: true,
  });

  if (errors.length > 0) {
    throw new InvalidArgumentException(
      'input',
      collectViolations(errors).join('; '),
    );
  }

  return instance;
}
