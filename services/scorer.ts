import { findKeywords, patternFor } from './extractor.js';

export const STRONG_PHRASES = [
  'otp', 'cvv', 'pin', 'verify immediately', 'blocked today',
  'account will be blocked', 'share your upi', 'click the link',
  'refund', 'cashback', 'kyc update', 'suspended',
];

export const SCAM_THRESHOLD = 0.35;

const WEIGHTS = {
  strongPhrase: 0.18,
  keyword: 0.05,
  link: 0.25,
  paymentHandle: 0.25,
  phone: 0.1,
};

const LINK = [patternFor('url'), patternFor('shortLink')];
const PAYMENT_HANDLE = patternFor('paymentHandle');
const PHONE = patternFor('phone');

export interface ScamScore {
  confidence: number;
  scamDetected: boolean;
}

/**
 * Additive heuristic over one message, clipped to 1. Keywords that also appear
 * in the strong list count in both bands.
 */
export function score(text: string): number {
  const lower = text.toLowerCase();
  let total = 0;

  for (const phrase of STRONG_PHRASES) {
    if (lower.includes(phrase)) total += WEIGHTS.strongPhrase;
  }
  total += findKeywords(text).length * WEIGHTS.keyword;

  if (LINK.some((re) => re.test(text))) total += WEIGHTS.link;
  if (PAYMENT_HANDLE.test(text)) total += WEIGHTS.paymentHandle;
  if (PHONE.test(text)) total += WEIGHTS.phone;

  return Math.min(total, 1);
}

export function assess(text: string): ScamScore {
  const confidence = score(text);
  return { confidence, scamDetected: confidence >= SCAM_THRESHOLD };
}
