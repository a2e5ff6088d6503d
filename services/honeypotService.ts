import {
  mergeEvidence,
  toIntelligence,
  type HoneypotResponse,
  type IncomingEvent,
  type Session,
} from '../types.js';
import { seedState, type Pipeline } from './pipeline.js';
import type { ReportOutcome } from './reporter.js';
import type { SessionStore } from './sessionStore.js';

export const FINALIZE_NOTE = 'Detected scam intent; extracted artifacts from conversation.';

export interface SessionReporter {
  report(session: Session): Promise<ReportOutcome>;
}

export interface HoneypotServiceDeps {
  store: SessionStore;
  pipeline: Pipeline;
  reporter: SessionReporter;
  historyWindow: number;
  now?: () => number;
}

export function appendNote(notes: string, note: string): string {
  return notes ? `${notes} ${note}` : note;
}

export class HoneypotService {
  private readonly now: () => number;

  constructor(private readonly deps: HoneypotServiceDeps) {
    this.now = deps.now ?? Date.now;
  }

  /**
   * Runs one inbound message under the session's lock. The session is only
   * touched after the whole pipeline succeeded, so a failing stage leaves it
   * exactly as the previous message left it.
   */
  async handle(event: IncomingEvent): Promise<HoneypotResponse> {
    const { store, pipeline, historyWindow } = this.deps;

    return store.withSession(event.sessionId, async (session): Promise<HoneypotResponse> => {
      const state = await pipeline.run(
        seedState(session, event.message, event.conversationHistory, historyWindow),
      );

      session.updatedAt = this.now();
      session.messageCount += 1;
      mergeEvidence(session.evidence, state.evidence);

      if (state.shouldFinalize && !session.finalized) {
        await this.finalize(session);
      }

      return {
        status: 'success',
        reply: state.reply,
        scamDetected: state.scamDetected,
        extractedIntelligence: toIntelligence(session.evidence),
        agentState: {
          confidence: Math.round(state.confidence * 1000) / 1000,
          totalMessagesExchanged: session.messageCount,
          finalized: session.finalized,
        },
      };
    });
  }

  private async finalize(session: Session): Promise<void> {
    session.finalized = true;
    session.notes = appendNote(session.notes, FINALIZE_NOTE);

    const intel = toIntelligence(session.evidence);
    console.log('\n' + '='.repeat(50));
    console.log(`🕵️ FINALIZE | Session: ${session.id} | Messages: ${session.messageCount}`);
    console.log(`📱 Phones: ${intel.phoneNumbers.join(', ') || 'None'}`);
    console.log(`💳 Banks:  ${intel.bankAccounts.join(', ') || 'None'}`);
    console.log(`🔗 UPI:    ${intel.upiIds.join(', ') || 'None'}`);
    console.log(`🌐 URLs:   ${intel.phishingLinks.join(', ') || 'None'}`);
    console.log(`🚩 Keys:   ${intel.suspiciousKeywords.join(', ') || 'None'}`);
    console.log('='.repeat(50) + '\n');

    // At most once: the latch stays set whatever the collector says.
    const outcome = await this.deps.reporter.report(session);
    if (!outcome.ok) {
      const detail = outcome.error.status ?? outcome.error.message;
      session.notes = appendNote(session.notes, `Report delivery failed: ${detail}`);
    }
  }
}
