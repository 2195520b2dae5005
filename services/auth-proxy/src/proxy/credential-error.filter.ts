import { type ArgumentsHost, Catch, type ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { sanitizeError } from '@token-proxy/utils';
import type { Response } from 'express';
import { CredentialError, IssuerRejectedError } from '../credentials';
import { RETRY_AFTER_SECONDS } from './proxy.constants';

/**
 * Requests that could not get a credential. A refused client is a gateway fault (502); everything
 * else is temporary (503) and tells the caller when to retry.
 */
@Catch(CredentialError)
export class CredentialErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(CredentialErrorFilter.name);

  public catch(exception: CredentialError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    const rejected = exception instanceof IssuerRejectedError;
    const status = rejected ? HttpStatus.BAD_GATEWAY : HttpStatus.SERVICE_UNAVAILABLE;

    this.logger.warn({
      msg: 'Request failed for lack of a credential',
      statusCode: status,
      error: sanitizeError(exception),
    });

    if (!rejected) {
      response.setHeader('Retry-After', String(RETRY_AFTER_SECONDS));
    }

    response.status(status).json({
      statusCode: status,
      error: rejected ? 'Bad Gateway' : 'Service Unavailable',
      message: exception.message,
    });
  }
}
