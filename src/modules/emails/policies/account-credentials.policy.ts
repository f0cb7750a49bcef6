/**
 * src/modules/emails/policies/account-credentials.policy.ts
 *
 * WHY:
 * - Each provider needs a different credential set; missing fields are rejected
 *   at connect time instead of failing on the first sync.
 *
 * RULES:
 * - imap: host + username + password.
 * - gmail, outlook: access token (OAuth tokens are obtained by the client app).
 */

import type { EmailProvider } from '../email.types';

export type ProvidedCredentials = {
  accessToken?: string;
  imapHost?: string;
  imapUsername?: string;
  imapPassword?: string;
};

/** Returns the validation message, or null when the credential set is complete. */
export function missingCredentialsMessage(
  provider: EmailProvider,
  creds: ProvidedCredentials,
): string | null {
  if (provider === 'imap') {
    return creds.imapHost && creds.imapUsername && creds.imapPassword
      ? null
      : 'IMAP accounts require imap_host, imap_username and imap_password';
  }

  return creds.accessToken ? null : `${provider} accounts require access_token`;
}
