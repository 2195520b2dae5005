import type { NestExpressApplication } from '@nestjs/platform-express';
import { Logger } from 'nestjs-pino';

export const MAX_BODY_SIZE = '50mb';

/** Shared by `main.ts` and the end-to-end tests. Expects the app created with `bodyParser: false`. */
export function configureApp(app: NestExpressApplication): NestExpressApplication {
  app.useLogger(app.get(Logger));
  // Bodies are forwarded byte for byte, whatever their content type.
  app.useBodyParser('raw', { type: () => true, limit: MAX_BODY_SIZE });
  app.enableShutdownHooks();
  return app;
}
