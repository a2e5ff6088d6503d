import type { Evidence, EvidenceCategory } from '../types.js';

/** Keywords are supporting context only and never count towards finalize. */
export const ARTIFACT_CATEGORIES: readonly EvidenceCategory[] = [
  'links',
  'paymentHandles',
  'phoneNumbers',
  'accountNumbers',
];

export const DEFAULT_MIN_ARTIFACTS = 3;

export function countArtifactCategories(evidence: Evidence): number {
  return ARTIFACT_CATEGORIES.filter((category) => evidence[category].size > 0).length;
}

/**
 * `evidence` must be the session's cumulative evidence including the current
 * message. Callers still gate on the session's `finalized` latch.
 */
export function shouldFinalize(
  evidence: Evidence,
  messageScamDetected: boolean,
  minArtifacts: number = DEFAULT_MIN_ARTIFACTS,
): boolean {
  return messageScamDetected && countArtifactCategories(evidence) >= minArtifacts;
}
