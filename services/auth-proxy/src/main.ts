import 'reflect-metadata';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { sanitizeError } from '@token-proxy/utils';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { Config } from './config';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true,
    bodyParser: false,
    abortOnError: false,
  });
  configureApp(app);

  const configService = app.get<ConfigService<Config, true>>(ConfigService);
  const { port, host } = configService.get('app', { infer: true });
  const { apiBaseUrl } = configService.get('upstream', { infer: true });

  await app.listen(port, host);
  app.get(Logger).log(`Proxying http://${host}:${port} to ${apiBaseUrl}`);
}

bootstrap().catch((error: unknown) => {
  // The pino logger may not exist yet when bootstrap fails.
  const entry = { level: 'fatal', msg: 'Failed to start auth-proxy', error: sanitizeError(error) };
  process.stderr.write(`${JSON.stringify(entry)}\n`);
  process.exit(1);
});
