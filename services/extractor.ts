import { emptyEvidence, type Evidence } from '../types.js';

export const SHORTENER_DOMAINS = ['bit.ly', 'tinyurl.com', 't.co', 'goo.gl', 'cutt.ly', 'rb.gy'];

export const SUSPICIOUS_KEYWORDS = [
  'urgent', 'verify', 'account blocked', 'blocked today', 'suspended', 'freeze',
  'kyc', 'otp', 'pin', 'cvv', 'click', 'link', 'refund', 'cashback',
  'upi', 'bank account', 'share details', 'immediately',
];

const escapeDomain = (domain: string) => domain.replace(/\./g, '\\.');

// Kept as sources so the scorer can build non-global copies; a shared /g regex carries lastIndex between calls.
export const PATTERNS = {
  url: { source: String.raw`https?:\/\/[^\s]+`, flags: 'i' },
  shortLink: {
    source: String.raw`\b(?:${SHORTENER_DOMAINS.map(escapeDomain).join('|')})\/[A-Za-z0-9_-]+\b`,
    flags: 'i',
  },
  // Both sides at least two chars; the guards reject handles glued to dotted or hyphenated text.
  paymentHandle: { source: String.raw`(?<![\w.-])[a-zA-Z0-9._-]{2,}@[a-zA-Z0-9]{2,}(?![\w.-])`, flags: '' },
  phone: { source: String.raw`(?<!\w)(?:\+91[-\s]?)?[6-9]\d{9}\b`, flags: '' },
  accountNumber: { source: String.raw`\b\d{9,18}\b`, flags: '' },
} as const;

export type PatternName = keyof typeof PATTERNS;

export function patternFor(name: PatternName, global = false): RegExp {
  const { source, flags } = PATTERNS[name];
  return new RegExp(source, global ? `${flags}g` : flags);
}

const TRAILING_PUNCTUATION = /[).,;]+$/;

function matchesOf(name: PatternName, text: string): string[] {
  return Array.from(text.matchAll(patternFor(name, true)), (m) => m[0].trim());
}

export function findKeywords(text: string): string[] {
  const lower = text.toLowerCase();
  return SUSPICIOUS_KEYWORDS.filter((keyword) => lower.includes(keyword));
}

/**
 * Pulls every artifact out of a single piece of text.
 *
 * Categories overlap on purpose: a ten digit mobile number also satisfies the
 * account-number pattern and lands in both sets. Payment handles and plain
 * `name@host` emails are indistinguishable here.
 */
export function extract(text: string): Evidence {
  const evidence = emptyEvidence();

  for (const link of [...matchesOf('url', text), ...matchesOf('shortLink', text)]) {
    const cleaned = link.replace(TRAILING_PUNCTUATION, '');
    if (cleaned) evidence.links.add(cleaned);
  }
  for (const handle of matchesOf('paymentHandle', text)) evidence.paymentHandles.add(handle);
  for (const phone of matchesOf('phone', text)) evidence.phoneNumbers.add(phone);
  for (const account of matchesOf('accountNumber', text)) evidence.accountNumbers.add(account);
  for (const keyword of findKeywords(text)) evidence.keywords.add(keyword);

  return evidence;
}
