import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { Logger } from '@nestjs/common';
import { AppModule } from './modules/app/app.module';
import { AppConfigService } from './modules/app/app-config.service';
import { configureApp } from './configure-app';

async function bootstrap() {
  const startup = new Logger('Startup');
  const isProd = (process.env.NODE_ENV ?? 'development').trim().toLowerCase() === 'production';
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: isProd ? ['error', 'warn', 'log'] : ['error', 'warn', 'log', 'debug', 'verbose'],
  });

  const appConfig = app.get(AppConfigService);

  if (!appConfig.isProd() && appConfig.logStartupInfo()) {
    const policy = appConfig.authorizationPolicy();
    startup.log(
      [
        `nodeEnv=${appConfig.nodeEnv()}`,
        `port=${appConfig.port()}`,
        `trustProxy=${appConfig.trustProxy()}`,
        `allowedOrigins=${appConfig.allowedOrigins().join(',') || '(none)'}`,
        `pageSize=${appConfig.pageSize()}`,
        `auth.denialMode=${policy.denialMode}`,
        `auth.staffOverride=${policy.staffOverride}`,
        `visibility.staffSeesAll=${appConfig.visibilityPolicy().staffSeesAll}`,
        `throttle.global=${appConfig.rateLimitLimit()}/${appConfig.rateLimitTtlMs()}ms`,
      ].join(' | '),
    );
  }

  configureApp(app, appConfig);
  app.enableShutdownHooks();

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Blog API')
    .setDescription('Posts, categories, comments and author profiles with visibility and ownership rules.')
    .setVersion('0.1.0')
    .build();
  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('docs', app, document);

  const port = appConfig.port();
  try {
    await app.listen(port);
    startup.log(`Listening on :${port}`);
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    if (code === 'EADDRINUSE') {
      startup.error(`Port ${port} is already in use.`);
    } else {
      startup.error(`Failed to start server: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exit(1);
  }
}

void bootstrap();
