import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

dotenv.config({ path: path.resolve(process.cwd(), './.env') });

const emptyToUndefined = (value: unknown) => {
  if (typeof value === 'string' && value.trim() === '') return undefined;
  return value;
};

const optionalString = z.preprocess(emptyToUndefined, z.string().optional());

const schema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(4000),
  FRONTEND_URL: z.preprocess(emptyToUndefined, z.string()).default('http://localhost:3000'),

  DB_TYPE: z.enum(['postgres', 'better-sqlite3']).default('postgres'),
  DATABASE_URL: optionalString,
  SQLITE_PATH: z.preprocess(emptyToUndefined, z.string()).default('company.db'),
  RUN_MIGRATIONS_ON_START: z.preprocess(emptyToUndefined, z.enum(['true', 'false']).default('false')),

  JWT_SECRET: z.preprocess(emptyToUndefined, z.string().min(16)).default('replace-with-secure-secret'),
  JWT_EXPIRES_IN_SECONDS: z.coerce.number().int().positive().default(8 * 60 * 60),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
  UPLOAD_DIR: z.preprocess(emptyToUndefined, z.string()).default('uploads'),

  SMTP_HOST: optionalString,
  SMTP_PORT: z.coerce.number().int().positive().default(465),
  SMTP_USER: optionalString,
  SMTP_PASS: optionalString,
  SMTP_FROM: optionalString,

  COMPANY_NAME: z.preprocess(emptyToUndefined, z.string()).default('Manpower Services')
});

export type Env = z.infer<typeof schema>;

export const env: Env = schema.parse(process.env);
