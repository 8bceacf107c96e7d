import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { AppConfigService } from './config/app-config.service';

async function bootstrap() {
  const app = configureApp(await NestFactory.create(AppModule));
  const config = app.get(AppConfigService);

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Crypto Store API')
      .setDescription('Products, mock crypto checkout and orders')
      .setVersion('1.0')
      .build(),
  );
  SwaggerModule.setup('api/docs', app, document); // http://localhost:8000/api/docs

  await app.listen(config.port, '0.0.0.0');
  Logger.log(`Listening on port ${config.port}`, 'Bootstrap');
}

bootstrap().catch((e: unknown) => {
  Logger.error(
    `Failed to start: ${e instanceof Error ? e.message : String(e)}`,
    'Bootstrap',
  );
  process.exit(1);
});
