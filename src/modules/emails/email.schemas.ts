/**
 * src/modules/emails/email.schemas.ts
 */

import { z } from 'zod';

const booleanQuery = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((v) => v === true || v === 'true' || v === '1');

export const addAccountSchema = z.object({
  provider: z.enum(['gmail', 'outlook', 'imap']),
  email_address: z.string().trim().email().max(255),
  display_name: z.string().max(255).optional(),
  access_token: z.string().min(1).optional(),
  refresh_token: z.string().min(1).optional(),
  token_expires_at: z.coerce.date().optional(),
  imap_host: z.string().min(1).max(255).optional(),
  imap_port: z.coerce.number().int().min(1).max(65535).optional(),
  imap_username: z.string().min(1).max(255).optional(),
  imap_password: z.string().min(1).optional(),
});

export type AddAccountInput = z.infer<typeof addAccountSchema>;

export const accountParamsSchema = z.object({
  accountId: z.string().uuid(),
});

export const syncSchema = z.object({
  account_id: z.string().uuid().optional(),
});

export const listEmailsQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  category: z.string().min(1).optional(),
  importance_min: z.coerce.number().min(0).max(1).optional(),
  unread_only: booleanQuery.default(false),
  include_archived: booleanQuery.default(false),
});

export const searchQuerySchema = z.object({
  q: z.string().trim().min(1).max(200),
  limit: z.coerce.number().int().min(1).max(100).default(50),
});

export const emailParamsSchema = z.object({
  id: z.string().uuid(),
});

export const emailActionParamsSchema = z.object({
  id: z.string().uuid(),
  action: z.string().min(1),
});
