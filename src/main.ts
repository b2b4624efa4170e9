import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { ApiEnabledGuard } from './common/guards/api-enabled.guard';
import { ApiExceptionFilter } from './common/filters/api-exception.filter';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    cors: true,
  });

  app.useGlobalGuards(app.get(ApiEnabledGuard));
  app.useGlobalFilters(app.get(ApiExceptionFilter));
  app.enableCors({ origin: '*' });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  const config = new DocumentBuilder()
    .setTitle('Network Activity Statistics')
    .setDescription('Live, windowed and trend statistics of a flight-simulation network region')
    .setVersion('1.0')
    .addTag('statistics')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('doc', app, document, {
    swaggerOptions: {
      defaultModelsExpandDepth: -1, // Hide schemas section
    },
  });

  app.enableShutdownHooks();
  await app.listen(app.get(ConfigService).get<number>('api.port') ?? 3000, '0.0.0.0');
}
bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
