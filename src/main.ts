import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { cors: true });
  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: true,
    }),
  );

  const configService = app.get(ConfigService);
  const port = configService.get<number>('app.port') || 4000;
  await app.listen(port, '0.0.0.0');
  new Logger('Bootstrap').log(`[APP] listening port=${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(`[APP] failed to start error=${error instanceof Error ? error.stack : String(error)}`);
  process.exit(1);
});
