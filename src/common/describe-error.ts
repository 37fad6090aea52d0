import { ValidationError } from 'class-validator';

/** One-line description of a thrown value, for log messages. */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (Array.isArray(error) && error.every((item) => item instanceof ValidationError)) {
    return error
      .map((item: ValidationError) =>
        `${item.property}: ${Object.values(item.constraints ?? {}).join(', ')}`,
      )
      .join('; ');
  }
  return String(error);
}
