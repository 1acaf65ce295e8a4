import 'reflect-metadata';

import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { LoggerUtil } from './common/logger/LoggerUtil';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableCors();
  app.enableShutdownHooks();

  const config = new DocumentBuilder()
    .setTitle('Course Enrollment Service')
    .setDescription('Enrollment, payment and course activation APIs')
    .setVersion('1.0')
    .addBearerAuth({ type: 'http', scheme: 'bearer', bearerFormat: 'JWT' }, 'access-token')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api-docs', app, document);

  const configService = app.get(ConfigService);
  const port = Number(configService.get<string>('PORT', '3000'));
  await app.listen(port);
  LoggerUtil.log(`Course enrollment service listening on port ${port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  LoggerUtil.error(
    'Failed to start course enrollment service',
    error instanceof Error ? error.stack : String(error),
    'Bootstrap',
  );
  process.exit(1);
});
