import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module';
import { FilmStoreService } from '../modules/films/film-store.service';

// usage: recalculate-composites.job.js [filmId ...]
async function main() {
  const app = await NestFactory.createApplicationContext(AppModule, { logger: ['error', 'warn', 'log'] });
  try {
    const ids = process.argv.slice(2).map(Number).filter((id) => Number.isInteger(id) && id > 0);
    const updated = await app.get(FilmStoreService).recalculateComposites(ids.length ? ids : undefined);
    console.log(`Recalculated composite ratings for ${updated} film(s).`);
  } finally {
    await app.close();
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
