import { pipeline } from 'node:stream/promises';
import {
  Inject,
  Injectable,
  Logger,
  MethodNotAllowedException,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  concealDiagnostic,
  elapsedMilliseconds,
  type LogsDiagnosticDataPolicy,
  sanitizeError,
} from '@token-proxy/utils';
import type { Request, Response } from 'express';
import { type Dispatcher, errors } from 'undici';
import { Config } from '../config';
import { type Credential, CredentialTimeoutError, TokenCache } from '../credentials';
import { buildDownstreamResponseHeaders, buildUpstreamRequestHeaders } from './forwarded-headers';
import { METHODS_WITH_BODY, UPSTREAM_DISPATCHER } from './proxy.constants';
import { UpstreamRequestError } from './upstream.errors';

const HTTP_METHODS: ReadonlySet<string> = new Set<Dispatcher.HttpMethod>([
  'GET',
  'HEAD',
  'POST',
  'PUT',
  'DELETE',
  'OPTIONS',
  'TRACE',
  'PATCH',
]);

function isHttpMethod(method: string): method is Dispatcher.HttpMethod {
  return HTTP_METHODS.has(method);
}

@Injectable()
export class ProxyService implements OnModuleDestroy {
  private readonly logger = new Logger(ProxyService.name);
  private readonly baseUrl: string;
  private readonly acquisitionTimeoutMs: number;
  private readonly diagnosticsPolicy: LogsDiagnosticDataPolicy;

  public constructor(
    private readonly tokenCache: TokenCache,
    @Inject(UPSTREAM_DISPATCHER) private readonly dispatcher: Dispatcher,
    configService: ConfigService<Config, true>,
  ) {
    this.baseUrl = configService.get('upstream', { infer: true }).apiBaseUrl;
    this.acquisitionTimeoutMs = configService.get('token', { infer: true }).acquisitionTimeoutMs;
    this.diagnosticsPolicy = configService.get('app', { infer: true }).logsDiagnosticsDataPolicy;
  }

  public async forward(req: Request, res: Response): Promise<void> {
    const method = req.method.toUpperCase();
    if (!isHttpMethod(method)) {
      throw new MethodNotAllowedException(`Method ${method} cannot be proxied`);
    }

    const credential = await this.acquireCredential();
    const target = new URL(`${this.baseUrl}${req.originalUrl}`);
    const body =
      METHODS_WITH_BODY.has(method) && Buffer.isBuffer(req.body) && req.body.length > 0
        ? req.body
        : undefined;

    const startedAt = Date.now();
    let upstream: Dispatcher.ResponseData;
    try {
      upstream = await this.dispatcher.request({
        origin: target.origin,
        path: `${target.pathname}${target.search}`,
        method,
        headers: buildUpstreamRequestHeaders(req.headers, credential.token),
        body,
      });
    } catch (error) {
      throw this.toUpstreamError(error);
    }

    res.status(upstream.statusCode);
    for (const [name, value] of Object.entries(buildDownstreamResponseHeaders(upstream.headers))) {
      res.setHeader(name, value);
    }

    try {
      await pipeline(upstream.body, res);
    } catch (error) {
      this.logger.warn({
        msg: 'Response stream to the client was interrupted',
        path: concealDiagnostic(req.path, this.diagnosticsPolicy),
        error: sanitizeError(error),
      });
      res.destroy();
      return;
    }

    this.logger.debug({
      msg: 'Proxied request',
      method,
      path: concealDiagnostic(req.path, this.diagnosticsPolicy),
      statusCode: upstream.statusCode,
      durationMs: elapsedMilliseconds(startedAt),
    });
  }

  public async onModuleDestroy(): Promise<void> {
    await this.dispatcher.close();
  }

  private async acquireCredential(): Promise<Credential> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new CredentialTimeoutError(this.acquisitionTimeoutMs)),
        this.acquisitionTimeoutMs,
      );
    });

    try {
      return await Promise.race([this.tokenCache.get(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private toUpstreamError(error: unknown): UpstreamRequestError {
    const timedOut =
      error instanceof errors.HeadersTimeoutError || error instanceof errors.BodyTimeoutError;
    const message = timedOut
      ? 'Upstream did not respond in time'
      : `Upstream request failed: ${error instanceof Error ? error.message : String(error)}`;

    return new UpstreamRequestError(message, timedOut, { cause: error });
  }
}
