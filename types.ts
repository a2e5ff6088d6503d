export interface ChatMessage {
  sender: string;
  text: string;
  timestamp: number;
}

export interface EventMetadata {
  channel: string;
  language: string;
  locale: string;
}

export interface IncomingEvent {
  sessionId: string;
  message: ChatMessage;
  conversationHistory: ChatMessage[];
  metadata: EventMetadata;
}

export type EvidenceCategory =
  | 'links'
  | 'paymentHandles'
  | 'phoneNumbers'
  | 'accountNumbers'
  | 'keywords';

export const EVIDENCE_CATEGORIES: readonly EvidenceCategory[] = [
  'links',
  'paymentHandles',
  'phoneNumbers',
  'accountNumbers',
  'keywords',
];

export type Evidence = Record<EvidenceCategory, Set<string>>;

export interface Session {
  id: string;
  createdAt: number;
  updatedAt: number;
  messageCount: number;
  finalized: boolean;
  notes: string;
  evidence: Evidence;
}

/** Per-message working record. Evidence sets are copies, never the session's own. */
export interface PipelineState {
  sessionId: string;
  text: string;
  sender: string;
  history: ChatMessage[];
  evidence: Evidence;
  confidence: number;
  scamDetected: boolean;
  shouldFinalize: boolean;
  reply: string;
}

export interface ExtractedIntelligence {
  bankAccounts: string[];
  upiIds: string[];
  phishingLinks: string[];
  phoneNumbers: string[];
  suspiciousKeywords: string[];
}

export interface HoneypotResponse {
  status: 'success';
  reply: string;
  scamDetected: boolean;
  extractedIntelligence: ExtractedIntelligence;
  agentState: {
    confidence: number;
    totalMessagesExchanged: number;
    finalized: boolean;
  };
}

export interface FinalReportPayload {
  sessionId: string;
  scamDetected: true;
  totalMessagesExchanged: number;
  extractedIntelligence: ExtractedIntelligence;
  agentNotes: string;
}

export interface ChatTurn {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface GenerateOptions {
  maxTokens: number;
  signal: AbortSignal;
}

/** Text-generation backend used to draft decoy replies. */
export interface Generator {
  readonly configured: boolean;
  generate(turns: ChatTurn[], options: GenerateOptions): Promise<string>;
}

export function emptyEvidence(): Evidence {
  return {
    links: new Set(),
    paymentHandles: new Set(),
    phoneNumbers: new Set(),
    accountNumbers: new Set(),
    keywords: new Set(),
  };
}

export function copyEvidence(source: Evidence): Evidence {
  return {
    links: new Set(source.links),
    paymentHandles: new Set(source.paymentHandles),
    phoneNumbers: new Set(source.phoneNumbers),
    accountNumbers: new Set(source.accountNumbers),
    keywords: new Set(source.keywords),
  };
}

/** Union `incoming` into `target` in place. Nothing is ever removed. */
export function mergeEvidence(target: Evidence, incoming: Evidence): void {
  for (const category of EVIDENCE_CATEGORIES) {
    for (const value of incoming[category]) {
      target[category].add(value);
    }
  }
}

const sorted = (values: Set<string>): string[] => [...values].sort();

export function toIntelligence(evidence: Evidence): ExtractedIntelligence {
  return {
    bankAccounts: sorted(evidence.accountNumbers),
    upiIds: sorted(evidence.paymentHandles),
    phishingLinks: sorted(evidence.links),
    phoneNumbers: sorted(evidence.phoneNumbers),
    suspiciousKeywords: sorted(evidence.keywords),
  };
}
