import { type ArgumentsHost, Catch, type ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { sanitizeError } from '@token-proxy/utils';
import type { Response } from 'express';
import { UpstreamRequestError } from './upstream.errors';

@Catch(UpstreamRequestError)
export class UpstreamErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(UpstreamErrorFilter.name);

  public catch(exception: UpstreamRequestError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    const status = exception.timedOut ? HttpStatus.GATEWAY_TIMEOUT : HttpStatus.BAD_GATEWAY;

    this.logger.error({
      msg: 'Upstream request failed',
      statusCode: status,
      error: sanitizeError(exception),
    });

    if (response.headersSent) {
      response.destroy();
      return;
    }

    response.status(status).json({
      statusCode: status,
      error: exception.timedOut ? 'Gateway Timeout' : 'Bad Gateway',
      message: exception.message,
    });
  }
}
