import 'reflect-metadata';
import 'dotenv/config';
import { Logger, ValidationPipe, VersioningType } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import helmet from 'helmet';
import { AppModule } from './app.module';
import validationOptions from './utils/validation-options';
import { AllConfigType } from './config/config.type';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { cors: true });
  const configService = app.get(ConfigService<AllConfigType>);
  const logger = new Logger('Bootstrap');

  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          styleSrc: ["'self'", "'unsafe-inline'"],
          scriptSrc: ["'self'", "'unsafe-inline'"], // Swagger UI inline bootstrap
          imgSrc: ["'self'", 'data:'],
          connectSrc: ["'self'"],
        },
      },
      noSniff: true,
    }),
  );

  app.enableShutdownHooks();
  app.setGlobalPrefix(
    configService.getOrThrow('app.apiPrefix', { infer: true }),
    {
      exclude: ['/'],
    },
  );
  app.enableVersioning({
    type: VersioningType.URI,
  });
  app.useGlobalPipes(new ValidationPipe(validationOptions));

  const port = configService.getOrThrow('app.port', { infer: true });

  if (configService.getOrThrow('app.swaggerEnabled', { infer: true })) {
    const options = new DocumentBuilder()
      .setTitle('VAV Takeoff API')
      .setDescription(
        'Extracts VAV box ids, airflow and inlet sizes from mechanical drawing PDFs',
      )
      .setVersion('1.0')
      .build();

    const document = SwaggerModule.createDocument(app, options);
    SwaggerModule.setup('docs', app, document);

    logger.log(`Swagger documentation available at http://localhost:${port}/docs`);
  }

  await app.listen(port);
  logger.log(
    `Listening on port ${port} (language model fallback: ${configService.getOrThrow('languageModel.enabled', { infer: true }) ? 'on' : 'off'})`,
  );
}
void bootstrap();
