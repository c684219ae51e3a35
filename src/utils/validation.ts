import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validate } from 'class-validator';

export interface ValidationResult<T> {
  value?: T;
  errors: string[];
}

function flattenErrors(errors: ValidationError[], parent = ''): string[] {
  return errors.flatMap((error) => {
    const property = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) =>
      message.replace(error.property, property),
    );
    return [...own, ...flattenErrors(error.children ?? [], property)];
  });
}

/** Transforms a parsed JSON value into `cls` and runs its class-validator rules. */
export async function validatePlain<T extends object>(
  cls: ClassConstructor<T>,
  plain: unknown,
): Promise<ValidationResult<T>> {
  if (typeof plain !== 'object' || plain === null || Array.isArray(plain)) {
    return { errors: ['expected a JSON object'] };
  }
  const instance = plainToInstance(cls, plain);
  const errors = await validate(instance, { forbidUnknownValues: true });
  if (errors.length) {
    return { errors: flattenErrors(errors) };
  }
  return { value: instance, errors: [] };
}
