import fastifyCookie from '@fastify/cookie';
import type { NestFastifyApplication } from '@nestjs/platform-fastify';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { cleanupOpenApiDoc } from 'nestjs-zod';

/** Plugins, prefix and docs shared by the server and the e2e tests. */
export async function setupApp(app: NestFastifyApplication): Promise<void> {
  // Fastify Cookie
  await app.register(fastifyCookie);

  app.setGlobalPrefix('api', { exclude: ['metrics'] });

  const config = new DocumentBuilder()
    .setTitle('Tutor Log API')
    .setDescription('Pupils, groups, tutoring sessions and payments')
    .setVersion('1.0')
    .addBearerAuth()
    .addCookieAuth('refreshToken')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, cleanupOpenApiDoc(document));
}
