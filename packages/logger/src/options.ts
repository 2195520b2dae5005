import path from 'node:path';
import { RequestMethod } from '@nestjs/common';
import type { Params } from 'nestjs-pino';
import type { Options } from 'pino-http';

export const productionTarget = {
  target: 'pino/file',
};

export const developmentTarget = {
  // pino-pretty options with functions cannot cross the worker boundary, so the worker loads this module
  target: path.resolve(__dirname, './development'),
};

export const redactedPaths = [
  'req.headers.authorization',
  'req.headers["proxy-authorization"]',
  'req.headers["api-key"]',
  'req.headers["x-api-key"]',
  'req.headers.cookie',
  'res.headers["set-cookie"]',
  'req.query["api-key"]',
];

export const defaultPinoHttpOptions: Options = {
  enabled: true,
  level: 'info',
  redact: {
    paths: redactedPaths,
    censor: () => '[Redacted]',
  },
  transport: process.env.NODE_ENV !== 'production' ? developmentTarget : productionTarget,
};

export const defaultLoggerOptions: Params = {
  renameContext: process.env.NODE_ENV !== 'production' ? 'caller' : undefined,
  pinoHttp: defaultPinoHttpOptions,
  exclude: [
    {
      method: RequestMethod.GET,
      path: 'health',
    },
    {
      method: RequestMethod.GET,
      path: 'up',
    },
  ],
};
