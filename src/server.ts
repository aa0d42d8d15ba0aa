import 'reflect-metadata';
import path from 'path';
import AppDataSource from './ormconfig';
import { env } from './config/env';
import { createApp } from './app';
import { systemClock } from './services/clock';
import { createMailerFromEnv } from './services/mailer';
import { DiskPhotoStore } from './services/photoStore';

async function main() {
  await AppDataSource.initialize();
  console.log(`DB initialized (${env.DB_TYPE})`);

  if (env.RUN_MIGRATIONS_ON_START === 'true') {
    console.log('Running migrations...');
    await AppDataSource.runMigrations();
    console.log('Migrations complete');
  }

  const app = createApp({
    dataSource: AppDataSource,
    clock: systemClock,
    photos: new DiskPhotoStore(path.resolve(process.cwd(), env.UPLOAD_DIR)),
    mailer: createMailerFromEnv(),
    jwtSecret: env.JWT_SECRET,
    bcryptRounds: env.BCRYPT_ROUNDS,
    companyName: env.COMPANY_NAME,
    corsOrigin: env.FRONTEND_URL
  });

  app.listen(env.PORT, () => console.log(`Server listening at http://localhost:${env.PORT}`));
}

main().catch((err) => {
  console.error('Startup error', err);
  process.exit(1);
});
