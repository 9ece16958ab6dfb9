import {
  InternalServerErrorException,
  NotFoundException,
  UnprocessableEntityException,
} from "@nestjs/common";
import { ProfileLoadError, ProfileNotFoundError, ProfileValidationError } from "@dnsha/core";

/**
 * Map Load-stage failures onto HTTP exceptions. Anything else is rethrown
 * unchanged for the global filter.
 */
export function rethrowProfileError(err: unknown): never {
  if (err instanceof ProfileNotFoundError) {
    throw new NotFoundException({
      message: err.message,
      available: err.available,
    });
  }
  if (err instanceof ProfileValidationError) {
    throw new UnprocessableEntityException({
      message: err.message,
      issues: err.issues,
    });
  }
  if (err instanceof ProfileLoadError) {
    throw new InternalServerErrorException(err.message);
  }
  throw err;
}
