import { ConfigType, registerAs } from '@nestjs/config';
import { ReopenPolicy } from '../common/enums/complaint.enum';

const toBool = (value: string | undefined, fallback: boolean): boolean =>
  value === undefined ? fallback : ['true', '1', 'yes'].includes(value.toLowerCase());

const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = value === undefined ? NaN : parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const toList = (value: string | undefined, fallback: string[]): string[] =>
  value
    ? value
        .split(',')
        .map((item) => item.trim().toLowerCase())
        .filter(Boolean)
    : fallback;

const toReopenPolicy = (value: string | undefined): ReopenPolicy => {
  const known = Object.values(ReopenPolicy).find((policy) => policy === value);
  return known ?? ReopenPolicy.DISABLED;
};

export const appConfig = registerAs('app', () => ({
  port: toInt(process.env.PORT, 3000),
  jwtSecret: process.env.JWT_SECRET ?? 'change-me',
  jwtExpiresIn: process.env.JWT_EXPIRES_IN ?? '1d',
  bcryptRounds: toInt(process.env.BCRYPT_ROUNDS, 10),
}));

export const databaseConfig = registerAs('database', () => ({
  host: process.env.DB_HOST ?? 'localhost',
  port: toInt(process.env.DB_PORT, 5432),
  username: process.env.DB_USERNAME ?? 'postgres',
  password: process.env.DB_PASSWORD ?? 'postgres',
  name: process.env.DB_NAME ?? 'campus_complaints',
  synchronize: toBool(process.env.DB_SYNCHRONIZE, false),
  logging: toBool(process.env.DB_LOGGING, false),
}));

export const complaintsConfig = registerAs('complaints', () => ({
  idTimeZone: process.env.COMPLAINT_ID_TIME_ZONE ?? 'UTC',
  idMaxRetries: toInt(process.env.COMPLAINT_ID_MAX_RETRIES, 5),
  reopenPolicy: toReopenPolicy(process.env.COMPLAINT_REOPEN_POLICY),
  defaultPageSize: toInt(process.env.COMPLAINT_PAGE_SIZE, 20),
  maxPageSize: toInt(process.env.COMPLAINT_MAX_PAGE_SIZE, 100),
  uploadDir: process.env.UPLOAD_DIR ?? 'uploads',
  attachmentMaxBytes: toInt(process.env.ATTACHMENT_MAX_BYTES, 10 * 1024 * 1024),
  attachmentAllowedExtensions: toList(process.env.ATTACHMENT_ALLOWED_EXTENSIONS, [
    'pdf',
    'jpg',
    'jpeg',
    'png',
    'docx',
  ]),
}));

export const mailConfig = registerAs('mail', () => ({
  enabled: toBool(process.env.MAIL_ENABLED, false),
  host: process.env.MAIL_HOST ?? 'localhost',
  port: toInt(process.env.MAIL_PORT, 465),
  secure: toBool(process.env.MAIL_SECURE, true),
  user: process.env.MAIL_USER ?? '',
  password: process.env.MAIL_PASSWORD ?? '',
  from: process.env.MAIL_FROM ?? 'complaints@example.org',
}));

export const seedConfig = registerAs('seed', () => ({
  onBoot: toBool(process.env.SEED_ON_BOOT, false),
  adminName: process.env.SEED_ADMIN_NAME ?? 'Administrator',
  adminEmail: process.env.SEED_ADMIN_EMAIL ?? 'admin@example.org',
  adminPassword: process.env.SEED_ADMIN_PASSWORD ?? 'change-me-123',
}));

export type AppConfig = ConfigType<typeof appConfig>;
export type DatabaseConfig = ConfigType<typeof databaseConfig>;
export type ComplaintsConfig = ConfigType<typeof complaintsConfig>;
export type MailConfig = ConfigType<typeof mailConfig>;
export type SeedConfig = ConfigType<typeof seedConfig>;

export const ALL_CONFIGS = [
  appConfig,
  databaseConfig,
  complaintsConfig,
  mailConfig,
  seedConfig,
];
