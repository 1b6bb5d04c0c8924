import {
  BadRequestException,
  HttpStatus,
  ValidationError,
  ValidationPipeOptions,
} from '@nestjs/common';
import {
  flattenValidationErrors,
  summarizeValidationErrors,
} from './validation-errors';

/**
 * Global pipe options. Rejections carry the same `{status, message, errors}`
 * body as schema and file validation in the extraction controller.
 */
const validationOptions: ValidationPipeOptions = {
  transform: true,
  whitelist: true,
  errorHttpStatusCode: HttpStatus.BAD_REQUEST,
  exceptionFactory: (errors: ValidationError[]) => {
    const details = flattenValidationErrors(errors);
    return new BadRequestException({
      status: HttpStatus.BAD_REQUEST,
      message: `Invalid request: ${summarizeValidationErrors(details)}`,
      errors: details,
    });
  },
};

export default validationOptions;
