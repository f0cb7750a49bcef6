/**
 * src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load .env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string.
 *   Comparisons in di.ts stay exhaustive and invalid values ('prod', 'staging') fail
 *   at startup in Zod instead of silently falling through.
 *
 * OPTIONAL INTEGRATIONS:
 * - OPENAI_API_KEY empty  -> AI engine answers with its fallback values.
 * - STRIPE_SECRET_KEY empty -> billing calls fail with 400 (plans catalog still works).
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : null));

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().default(8000),
  API_PREFIX: z.string().startsWith('/').default('/api/v1'),
  PROJECT_NAME: z.string().default('EmailMind'),
  VERSION: z.string().default('1.0.0'),

  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().min(1),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('emailmind-api'),

  BCRYPT_COST: z.coerce.number().int().min(10).max(15).default(12),

  // Access tokens
  SECRET_KEY: z.string().min(8),
  ALGORITHM: z.literal('HS256').default('HS256'),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().min(1).max(60 * 24 * 30).default(30),

  // Provider credentials at rest (AES-256-GCM, 32-byte key)
  ENCRYPTION_KEY_BASE64: z.string().min(1),

  // AI
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_CLASSIFIER_MODEL: z.string().default('gpt-4o-mini'),

  // Billing
  STRIPE_SECRET_KEY: optionalString,
  STRIPE_WEBHOOK_SECRET: optionalString,
  STRIPE_STARTER_PRICE_ID: optionalString,
  STRIPE_PROFESSIONAL_PRICE_ID: optionalString,
  STRIPE_ENTERPRISE_PRICE_ID: optionalString,
  STRIPE_STARTER_YEARLY_PRICE_ID: optionalString,
  STRIPE_PROFESSIONAL_YEARLY_PRICE_ID: optionalString,
  STRIPE_ENTERPRISE_YEARLY_PRICE_ID: optionalString,

  // Gmail OAuth client (tokens come from the client app)
  GMAIL_CLIENT_ID: optionalString,
  GMAIL_CLIENT_SECRET: optionalString,

  WORKER_CONCURRENCY: z.coerce.number().int().min(1).max(50).default(5),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type BillingCycle = 'monthly' | 'yearly';
export type PaidTier = 'starter' | 'professional' | 'enterprise';

export type StripePriceIds = Record<PaidTier, Record<BillingCycle, string | null>>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  apiPrefix: string;
  projectName: string;
  version: string;

  databaseUrl: string;
  redisUrl: string;

  logLevel: string;
  serviceName: string;

  bcryptCost: number;

  auth: {
    secretKey: string;
    algorithm: 'HS256';
    accessTokenExpireMinutes: number;
  };

  encryptionKeyBase64: string;

  openai: {
    apiKey: string | null;
    model: string;
    classifierModel: string;
  };

  stripe: {
    secretKey: string | null;
    webhookSecret: string | null;
    priceIds: StripePriceIds;
  };

  gmail: {
    clientId: string | null;
    clientSecret: string | null;
  };

  worker: {
    concurrency: number;
  };
};

export function buildConfig(): AppConfig {
  const parsed = ConfigSchema.parse(process.env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    apiPrefix: parsed.API_PREFIX,
    projectName: parsed.PROJECT_NAME,
    version: parsed.VERSION,

    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    bcryptCost: parsed.BCRYPT_COST,

    auth: {
      secretKey: parsed.SECRET_KEY,
      algorithm: parsed.ALGORITHM,
      accessTokenExpireMinutes: parsed.ACCESS_TOKEN_EXPIRE_MINUTES,
    },

    encryptionKeyBase64: parsed.ENCRYPTION_KEY_BASE64,

    openai: {
      apiKey: parsed.OPENAI_API_KEY,
      model: parsed.OPENAI_MODEL,
      classifierModel: parsed.OPENAI_CLASSIFIER_MODEL,
    },

    stripe: {
      secretKey: parsed.STRIPE_SECRET_KEY,
      webhookSecret: parsed.STRIPE_WEBHOOK_SECRET,
      priceIds: {
        starter: {
          monthly: parsed.STRIPE_STARTER_PRICE_ID,
          yearly: parsed.STRIPE_STARTER_YEARLY_PRICE_ID,
        },
        professional: {
          monthly: parsed.STRIPE_PROFESSIONAL_PRICE_ID,
          yearly: parsed.STRIPE_PROFESSIONAL_YEARLY_PRICE_ID,
        },
        enterprise: {
          monthly: parsed.STRIPE_ENTERPRISE_PRICE_ID,
          yearly: parsed.STRIPE_ENTERPRISE_YEARLY_PRICE_ID,
        },
      },
    },

    gmail: {
      clientId: parsed.GMAIL_CLIENT_ID,
      clientSecret: parsed.GMAIL_CLIENT_SECRET,
    },

    worker: {
      concurrency: parsed.WORKER_CONCURRENCY,
    },
  };
}
