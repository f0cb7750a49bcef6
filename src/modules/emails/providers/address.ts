/**
 * src/modules/emails/providers/address.ts
 *
 * Header address parsing for the Gmail adapter (IMAP gets parsed addresses from mailparser).
 */

export type ParsedAddress = { email: string; name: string | null };

const ADDRESS_RE = /(?:"?([^"<,]*?)"?\s*)?<([^<>\s]+@[^<>\s]+)>|([^\s,<>"]+@[^\s,<>"]+)/g;

export function parseAddressList(header: string | null | undefined): ParsedAddress[] {
  if (!header) return [];

  const out: ParsedAddress[] = [];
  for (const m of header.matchAll(ADDRESS_RE)) {
    const bracketed = m[2];
    const bare = m[3];
    const email = (bracketed ?? bare ?? '').trim().toLowerCase();
    if (!email) continue;

    const name = bracketed ? (m[1] ?? '').trim() : '';
    out.push({ email, name: name || null });
  }
  return out;
}

export function parseAddress(header: string | null | undefined): ParsedAddress | null {
  return parseAddressList(header)[0] ?? null;
}

export function toSnippet(text: string | null, max = 200): string | null {
  if (!text) return null;
  const collapsed = text.replace(/\s+/g, ' ').trim();
  return collapsed ? collapsed.slice(0, max) : null;
}
