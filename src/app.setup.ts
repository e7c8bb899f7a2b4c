import { INestApplication, ValidationPipe } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { HttpErrorFilter } from './common/filters/http-error.filter';
import { SERVICE_NAME, SERVICE_VERSION } from './app.constants';

/**
 * CORS abierto, validación de query strings y formato de errores { error }
 */
export function configureApp(app: INestApplication): void {
  app.enableCors({ origin: '*', methods: ['GET'] });
  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
  app.useGlobalFilters(new HttpErrorFilter());
}

export function setupSwagger(app: INestApplication): void {
  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle(SERVICE_NAME)
      .setDescription('Resuelve URLs de YouTube en metadatos y enlaces de descarga')
      .setVersion(SERVICE_VERSION)
      .build(),
  );
  SwaggerModule.setup('docs', app, document);
}
