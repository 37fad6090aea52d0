import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppClusterService } from './app-cluster.service';
import { AppModule } from './app.module';
import { AppConfig } from './config/app.config';
import { loadEnvFile } from './config/env';
import { configureApp } from './setup-app';

async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule.forRoot(process.env.DATABASE),
    new FastifyAdapter({ logger: true }),
  );
  const config = app.get<ConfigService<AppConfig, true>>(ConfigService);

  await configureApp(app, config.get('media', { infer: true }));

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Image Classifier')
      .setDescription(
        'Upload an image to classify it with a pretrained network. The top five predictions are returned with localized labels and the best one is stored in a searchable history.',
      )
      .setVersion('1.0')
      .addTag('predict')
      .addTag('results')
      .build(),
  );
  SwaggerModule.setup('api/docs', app, document);

  await app.listen(config.get<AppConfig, 'port'>('port', { infer: true }), '0.0.0.0');
}

loadEnvFile();
AppClusterService.clusterize(bootstrap);
