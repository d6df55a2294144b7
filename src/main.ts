import 'reflect-metadata';
import 'dotenv/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableCors({
    origin: process.env.CORS_ORIGIN ? process.env.CORS_ORIGIN.split(',') : true,
    credentials: true,
  });
  const port = Number(process.env.PORT ?? 3001);
  await app.listen(port);

  const url = await app.getUrl();
  console.log(`[API] Listening on ${url} (port=${port})`);
}

bootstrap().catch((err: unknown) => {
  console.error('[API] Failed to start', err);
  process.exit(1);
});
