import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp, setupSwagger } from './app.setup';
import { loadConfig, resolveLogLevels } from './config/app.config';

async function bootstrap(): Promise<void> {
  const config = loadConfig(process.env);

  const app = await NestFactory.create(AppModule, {
    logger: resolveLogLevels(config.logLevel),
  });
  configureApp(app);
  setupSwagger(app);

  await app.listen(config.port, config.host);
  Logger.log(`🚀 Escuchando en http://${config.host}:${config.port} (enlaces: ${config.linkSource})`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(`❌ No se pudo iniciar el servicio: ${error instanceof Error ? error.message : String(error)}`, 'Bootstrap');
  process.exit(1);
});
