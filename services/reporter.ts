import { ReportDeliveryError, errorMessage } from '../errors.js';
import { toIntelligence, type FinalReportPayload, type Session } from '../types.js';
import { drainBody, fetchWithTimeout, type FetchLike } from './http.js';

export const DEFAULT_AGENT_NOTES = 'Scammer used urgency + verification tactics; extracted artifacts.';

export type ReportOutcome = { ok: true } | { ok: false; error: ReportDeliveryError };

export interface ReporterOptions {
  url: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

export function buildPayload(session: Session): FinalReportPayload {
  return {
    sessionId: session.id,
    scamDetected: true,
    totalMessagesExchanged: session.messageCount,
    extractedIntelligence: toIntelligence(session.evidence),
    agentNotes: session.notes || DEFAULT_AGENT_NOTES,
  };
}

/**
 * Posts the finalize payload to the collector. One attempt only: a failure is
 * returned to the caller and never retried.
 */
export class Reporter {
  constructor(private readonly options: ReporterOptions) {}

  async report(session: Session): Promise<ReportOutcome> {
    const payload = buildPayload(session);

    try {
      const response = await fetchWithTimeout(
        this.options.url,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(payload),
        },
        this.options.timeoutMs,
        this.options.fetchImpl,
      );

      const body = await drainBody(response);
      if (!response.ok) {
        console.error(`❌ Collector returned ${response.status} for ${session.id}: ${body.slice(0, 200)}`);
        return {
          ok: false,
          error: new ReportDeliveryError(`collector returned ${response.status}`, response.status),
        };
      }

      console.log(`✅ Reported session ${session.id}`);
      return { ok: true };
    } catch (err) {
      console.error(`❌ Report delivery failed for ${session.id}:`, errorMessage(err));
      return { ok: false, error: new ReportDeliveryError(errorMessage(err)) };
    }
  }
}
