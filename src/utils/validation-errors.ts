import { ValidationError } from '@nestjs/common';

/**
 * Flatten nested class-validator errors into `path: message` pairs,
 * e.g. `fields[1].name` or `[0].kind` for array roots.
 */
export function flattenValidationErrors(
  errors: ValidationError[],
  parentPath = '',
): Record<string, string> {
  return errors.reduce<Record<string, string>>((details, error) => {
    let path: string;
    if (/^\d+$/.test(error.property)) {
      path = `${parentPath}[${error.property}]`;
    } else {
      path = parentPath ? `${parentPath}.${error.property}` : error.property;
    }

    if (error.constraints) {
      details[path] = Object.values(error.constraints).join(', ');
    }

    return error.children && error.children.length > 0
      ? { ...details, ...flattenValidationErrors(error.children, path) }
      : details;
  }, {});
}

export function summarizeValidationErrors(
  details: Record<string, string>,
): string {
  return Object.entries(details)
    .map(([path, message]) => `${path}: ${message}`)
    .join('; ');
}
