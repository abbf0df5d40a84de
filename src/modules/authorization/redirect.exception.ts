import { HttpException, HttpStatus } from '@nestjs/common';

/** Rendered by ApiExceptionFilter as a 303 with a Location header. */
export class RedirectException extends HttpException {
  constructor(
    readonly location: string,
    message = 'Redirecting.',
  ) {
    super({ message, error: 'redirect' }, HttpStatus.SEE_OTHER);
  }
}
