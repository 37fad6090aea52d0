import compression from '@fastify/compress';
import { fastifyMultipart } from '@fastify/multipart';
import { NestFastifyApplication } from '@nestjs/platform-fastify';
import { resolve } from 'path';
import { MAX_FILE_SIZE } from './classification/classification.constants';
import { AppConfig } from './config/app.config';

/**
 * Registers the Fastify plugins the HTTP layer depends on. Shared by the
 * server bootstrap and the end-to-end specs.
 */
export async function configureApp(
  app: NestFastifyApplication,
  media: AppConfig['media'],
): Promise<void> {
  await app.register(compression, {
    global: true,
    zlibOptions: {
      level: 6,
    },
    threshold: 512,
    encodings: ['gzip', 'deflate', 'br'],
  });

  // One byte over the limit is read so oversized uploads can be told apart
  // from ones of exactly the maximum size.
  await app.register(fastifyMultipart, {
    throwFileSizeLimit: false,
    limits: {
      fileSize: MAX_FILE_SIZE + 1,
      files: 1,
    },
  });

  app.useStaticAssets({
    root: resolve(media.root),
    prefix: media.url,
    decorateReply: false,
  });

  app.enableCors({
    origin: ['*'],
    methods: ['GET', 'POST', 'HEAD', 'OPTIONS'],
    credentials: false,
  });
}
