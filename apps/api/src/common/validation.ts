import { BadRequestException, ValidationPipe } from "@nestjs/common";
import type { ErrorResponse } from "@blockprover/shared";

/** Global request validation; failures answer 400 with an `{error}` body. */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    transform: true,
    whitelist: true,
    exceptionFactory: (errors) => {
      const body: ErrorResponse = {
        error: errors.flatMap((error) => Object.values(error.constraints ?? {})).join("; ")
      };
      return new BadRequestException(body);
    }
  });
}
