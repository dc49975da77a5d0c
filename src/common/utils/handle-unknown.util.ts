import { HttpException, InternalServerErrorException } from '@nestjs/common';

/** Re-throws HTTP exceptions as they are and wraps anything else in a 500. */
export function handleUnknown(err: unknown, message: string): never {
  if (err instanceof HttpException) {
    throw err;
  }
  throw new InternalServerErrorException(
    {
      success: false,
      message,
      error: err instanceof Error ? err.message : String(err),
    },
    { cause: err },
  );
}
