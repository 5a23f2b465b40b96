import type { EntityKind, ExtractedEntity, ModelHints } from '../types.js';

const SCHEME_URL = /\b(?:https?|ftp):\/\/[^\s<>"'`]+/gi;
const BARE_DOMAIN =
  /(?<![\w@./-])(?:www\.)?(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+([a-z]{2,24})(?::\d{2,5})?(?:\/[^\s<>"'`]*)?/gi;
// alias@issuer; an issuer followed by a ".tld" word is an e-mail address, not a handle.
const PAYMENT_HANDLE =
  /(?<![\w.@-])[A-Za-z0-9][\w.-]*@[A-Za-z][A-Za-z0-9]+(?![\w@-]|\.(?:[a-z]{2,}|[A-Z]{2,})\b)/g;
// Separators stay on one line so numbers on adjacent lines never fuse.
const PHONE =
  /(?<![\w+])(?:(?:\+|00)(\d{1,3})[ \t.-]?)?((?:\(\d{2,5}\)|\d{2,5})(?:[ \t.-]?\d{2,5}){1,3})(?!\w)/g;
const DIGIT_GROUP = /\d+/g;
const TRAILING_PUNCTUATION = /[.,;:!?)\]}'"]+$/;

// Bare domains count only with a TLD scammers favour, a "www." prefix, or a known shortener.
const SUSPICIOUS_TLDS = new Set([
  'com', 'net', 'org', 'in', 'co', 'info', 'biz', 'xyz', 'top', 'online', 'site', 'live',
  'click', 'link', 'shop', 'store', 'app', 'icu', 'buzz', 'vip', 'cc', 'me', 'io', 'ly', 'gl', 'gd',
]);
const SHORTENERS = new Set(['bit.ly', 'tinyurl.com', 't.co', 'goo.gl', 'is.gd', 'rb.gy', 'cutt.ly']);
// TLDs that are also everyday words; "blocked.click" is a typo, "pay.click/now" is a link.
const WORD_TLDS = new Set(['click', 'link', 'shop', 'store', 'app', 'live', 'site', 'online', 'top', 'me', 'buzz']);
// National numbers are at most this long; once reached, later digit groups are not part of it.
const NATIONAL_DIGITS = 10;

const KIND_ORDER: EntityKind[] = ['payment_handle', 'phone_number', 'url'];

export function entityKey(entity: ExtractedEntity): string {
  return `${entity.kind}:${entity.value}`;
}

export function compareEntities(a: ExtractedEntity, b: ExtractedEntity): number {
  const byKind = KIND_ORDER.indexOf(a.kind) - KIND_ORDER.indexOf(b.kind);
  if (byKind !== 0) return byKind;
  if (a.value === b.value) return 0;
  return a.value < b.value ? -1 : 1;
}

function normalizeUrl(raw: string, withScheme: boolean): string | undefined {
  const trimmed = raw.replace(TRAILING_PUNCTUATION, '');
  let parsed: URL;
  try {
    parsed = new URL(withScheme ? trimmed : `http://${trimmed}`);
  } catch {
    return undefined;
  }
  if (!parsed.hostname.includes('.')) return undefined;
  const path = parsed.pathname === '/' ? '' : parsed.pathname;
  return `${parsed.host}${path}${parsed.search}`;
}

function isSuspiciousBareDomain(match: string, tld: string): boolean {
  const host = match.split(/[/:]/)[0].toLowerCase();
  if (host.startsWith('www.') || SHORTENERS.has(host)) return true;
  if (tld !== tld.toLowerCase() && tld !== tld.toUpperCase()) return false;
  const lower = tld.toLowerCase();
  if (WORD_TLDS.has(lower) && !match.includes('/')) return false;
  return SUSPICIOUS_TLDS.has(lower);
}

function normalizePhone(countryCode: string | undefined, digits: string): string | undefined {
  if (countryCode) {
    if (digits.length < 6 || digits.length > 12 || countryCode.length + digits.length > 15) return undefined;
    return countryCode + digits;
  }
  if (digits.length === 10 || (digits.length === 11 && digits.startsWith('0'))) return digits;
  return undefined;
}

/**
 * Picks the phone number from the digit groups of one match: groups are taken
 * until a national number's length is reached, then dropped from the end until
 * what is left normalizes. A trailing one- or two-digit group ("24/7",
 * "10 minutes") never counts.
 */
function pickPhone(
  countryCode: string | undefined,
  groups: string[],
): { value: string; groupCount: number } | undefined {
  let count = 0;
  let digits = 0;
  while (count < groups.length && digits < NATIONAL_DIGITS) {
    digits += groups[count].length;
    count++;
  }
  for (; count > 0; count--) {
    if (count > 1 && groups[count - 1].length < 3) continue;
    const value = normalizePhone(countryCode, groups.slice(0, count).join(''));
    if (value) return { value, groupCount: count };
  }
  return undefined;
}

function scanPhones(text: string): string[] {
  const phones: string[] = [];
  const re = new RegExp(PHONE.source, PHONE.flags);
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    const nationalStart = m.index + m[0].length - m[2].length;
    const groups = [...m[2].matchAll(DIGIT_GROUP)];
    const picked = pickPhone(m[1], groups.map((g) => g[0]));
    if (picked) {
      phones.push(picked.value);
      const last = groups[picked.groupCount - 1];
      re.lastIndex = nationalStart + (last.index ?? 0) + last[0].length;
    } else if (groups.length > 1) {
      // Nothing fits from the first group; try again from the second.
      re.lastIndex = nationalStart + (groups[1].index ?? 0);
    }
  }
  return phones;
}

function blank(text: string, match: string, index: number): string {
  return text.slice(0, index) + ' '.repeat(match.length) + text.slice(index + match.length);
}

/**
 * Finds payment handles, phone numbers and URLs in free text. Pure and
 * deterministic; the result is deduplicated and sorted by kind, then value.
 *
 * URLs are matched first and their spans blanked, so digits or `@` inside a
 * link never surface as a phone number or handle.
 */
export function extract(text: string): ExtractedEntity[] {
  const found = new Map<string, ExtractedEntity>();
  const add = (kind: EntityKind, value: string | undefined) => {
    if (!value) return;
    const entity = { kind, value };
    found.set(entityKey(entity), entity);
  };

  let rest = text;
  for (const m of text.matchAll(SCHEME_URL)) {
    add('url', normalizeUrl(m[0], true));
    rest = blank(rest, m[0], m.index ?? 0);
  }

  for (const m of rest.matchAll(BARE_DOMAIN)) {
    if (!isSuspiciousBareDomain(m[0], m[1])) continue;
    add('url', normalizeUrl(m[0], false));
    rest = blank(rest, m[0], m.index ?? 0);
  }

  for (const m of rest.matchAll(PAYMENT_HANDLE)) {
    add('payment_handle', m[0].toLowerCase());
    rest = blank(rest, m[0], m.index ?? 0);
  }

  for (const phone of scanPhones(rest)) {
    add('phone_number', phone);
  }

  return [...found.values()].sort(compareEntities);
}

/** Set union by (kind, value); nothing already known is ever dropped. */
export function mergeEntities(existing: ExtractedEntity[], incoming: ExtractedEntity[]): ExtractedEntity[] {
  const merged = new Map<string, ExtractedEntity>();
  for (const entity of [...existing, ...incoming]) {
    merged.set(entityKey(entity), entity);
  }
  return [...merged.values()].sort(compareEntities);
}

// Model hints are admitted only if they look like the real thing to `extract`.
export function extractFromHints(hints: ModelHints): ExtractedEntity[] {
  const urls = hints.urls.map((u) => (/^[a-z]+:\/\//i.test(u) ? u : `http://${u}`));
  return extract([...hints.paymentHandles, ...hints.phoneNumbers, ...urls].join('\n'));
}
