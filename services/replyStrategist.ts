import { GenerationError, errorMessage } from '../errors.js';
import type { ChatTurn, Generator, PipelineState } from '../types.js';

export const CLARIFICATION_REPLY =
  "Sorry, who is this and which bank or service is this about? I didn't request anything.";

export const FALLBACK_REPLY =
  "I'm confused, can you resend the link and tell me the exact steps? My app isn't opening properly.";

export const MAX_REPLY_LENGTH = 500;

export const PERSONA_PROMPT = `You are an ordinary person in India replying over SMS or WhatsApp.
You are anxious and a little confused, but willing to cooperate.
Goal: ask questions that make the other person reveal their details (UPI ID, phone number, link, bank account, exact steps).
Never share an OTP, PIN, CVV, password or any real personal information, even if asked repeatedly.
Keep replies short (1-2 sentences), natural and non-robotic. Output plain text only.`;

const HINTS = {
  link: 'They already sent a link; ask them to resend it or tell you the domain name.',
  paymentHandle: 'Try to get their exact UPI ID and the receiver name shown on screen.',
  otp: 'Say the OTP has not arrived; ask for the steps or a link instead.',
  generic: 'Ask which bank this is, the exact steps, and the link or UPI ID to use.',
};

export function contextHint(state: PipelineState): string {
  const lower = state.text.toLowerCase();
  const hints: string[] = [];

  if (state.evidence.links.size > 0) hints.push(HINTS.link);
  if (state.evidence.paymentHandles.size > 0 || lower.includes('upi')) hints.push(HINTS.paymentHandle);
  // current message only
  if (lower.includes('otp')) hints.push(HINTS.otp);

  return hints.length > 0 ? hints.join(' ') : HINTS.generic;
}

export function buildTurns(state: PipelineState): ChatTurn[] {
  return [
    { role: 'system', content: PERSONA_PROMPT },
    ...state.history.map((turn): ChatTurn => ({
      role: turn.sender === 'scammer' ? 'user' : 'assistant',
      content: turn.text,
    })),
    {
      role: 'user',
      content: `Latest scammer message: ${state.text}\n\nGuidance: ${contextHint(state)}`,
    },
  ];
}

/** First non-empty line only, capped. Throws when nothing usable came back. */
export function firstLine(raw: string): string {
  const line = (raw.trim().split('\n')[0] ?? '').trim();
  if (!line) throw new GenerationError('malformed', 'generation returned no text');
  return line.slice(0, MAX_REPLY_LENGTH);
}

export interface ReplyStrategistOptions {
  timeoutMs: number;
  maxTokens: number;
}

export class ReplyStrategist {
  constructor(
    private readonly generator: Generator,
    private readonly options: ReplyStrategistOptions,
  ) {}

  /** Never rejects: every generation failure becomes {@link FALLBACK_REPLY}. */
  async buildReply(state: PipelineState): Promise<string> {
    if (!state.scamDetected) return CLARIFICATION_REPLY;

    try {
      const raw = await this.generateWithTimeout(buildTurns(state));
      return firstLine(raw);
    } catch (error) {
      const kind = error instanceof GenerationError ? error.kind : 'service';
      console.warn(`⚠️ Fallback reply | Session: ${state.sessionId} | ${kind}: ${errorMessage(error)}`);
      return FALLBACK_REPLY;
    }
  }

  private async generateWithTimeout(turns: ChatTurn[]): Promise<string> {
    const { timeoutMs, maxTokens } = this.options;
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    // The race bounds providers that ignore the abort signal.
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new GenerationError('timeout', `generation exceeded ${timeoutMs}ms`));
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        this.generator.generate(turns, { maxTokens, signal: controller.signal }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
