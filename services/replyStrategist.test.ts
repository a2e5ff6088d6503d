import { describe, expect, it, vi } from 'vitest';
import { GenerationError } from '../errors.js';
import { emptyEvidence, type ChatTurn, type GenerateOptions, type Generator, type PipelineState } from '../types.js';
import {
  CLARIFICATION_REPLY,
  FALLBACK_REPLY,
  MAX_REPLY_LENGTH,
  PERSONA_PROMPT,
  ReplyStrategist,
  buildTurns,
  contextHint,
  firstLine,
} from './replyStrategist.js';

function makeState(overrides: Partial<PipelineState> = {}): PipelineState {
  return {
    sessionId: 's-1',
    text: 'Your KYC is pending, act now',
    sender: 'scammer',
    history: [],
    evidence: emptyEvidence(),
    confidence: 0.6,
    scamDetected: true,
    shouldFinalize: false,
    reply: '',
    ...overrides,
  };
}

function fakeGenerator(impl: (turns: ChatTurn[], options: GenerateOptions) => Promise<string>) {
  const generate = vi.fn(impl);
  const generator: Generator = { configured: true, generate };
  return { generator, generate };
}

const options = { timeoutMs: 200, maxTokens: 180 };

describe('ReplyStrategist', () => {
  it('returns the clarification reply without generating when no scam was detected', async () => {
    const { generator, generate } = fakeGenerator(async () => 'unused');
    const reply = await new ReplyStrategist(generator, options).buildReply(makeState({ scamDetected: false }));

    expect(reply).toBe(CLARIFICATION_REPLY);
    expect(generate).not.toHaveBeenCalled();
  });

  it('keeps only the first line of the generated text', async () => {
    const { generator, generate } = fakeGenerator(async () => '  Which bank is this?\nI am worried.  ');
    const reply = await new ReplyStrategist(generator, options).buildReply(makeState());

    expect(reply).toBe('Which bank is this?');
    expect(generate).toHaveBeenCalledTimes(1);
    expect(generate.mock.calls[0]?.[1].maxTokens).toBe(180);
  });

  it('caps the reply length', async () => {
    const { generator } = fakeGenerator(async () => 'a'.repeat(MAX_REPLY_LENGTH + 50));
    const reply = await new ReplyStrategist(generator, options).buildReply(makeState());
    expect(reply).toHaveLength(MAX_REPLY_LENGTH);
  });

  it('falls back when the service fails', async () => {
    const { generator } = fakeGenerator(async () => {
      throw new GenerationError('service', 'AI API error [503]');
    });
    expect(await new ReplyStrategist(generator, options).buildReply(makeState())).toBe(FALLBACK_REPLY);
  });

  it('falls back on an empty response', async () => {
    const { generator } = fakeGenerator(async () => '   \n  ');
    expect(await new ReplyStrategist(generator, options).buildReply(makeState())).toBe(FALLBACK_REPLY);
  });

  it('falls back and aborts the request when generation exceeds the timeout', async () => {
    let seen: AbortSignal | undefined;
    const { generator } = fakeGenerator((_turns, { signal }) => {
      seen = signal;
      return new Promise<string>(() => {});
    });

    const reply = await new ReplyStrategist(generator, { timeoutMs: 20, maxTokens: 10 }).buildReply(makeState());

    expect(reply).toBe(FALLBACK_REPLY);
    expect(seen?.aborted).toBe(true);
  });
});

describe('contextHint', () => {
  it('asks for the domain when a link was already seen', () => {
    const state = makeState();
    state.evidence.links.add('bit.ly/x');
    expect(contextHint(state)).toBe(
      'They already sent a link; ask them to resend it or tell you the domain name.',
    );
  });

  it('asks for the exact handle when UPI is only mentioned', () => {
    expect(contextHint(makeState({ text: 'Pay through UPI now' }))).toBe(
      'Try to get their exact UPI ID and the receiver name shown on screen.',
    );
  });

  it('combines hints in a fixed order', () => {
    const state = makeState({ text: 'Send the OTP you received' });
    state.evidence.paymentHandles.add('upi@ybl');
    expect(contextHint(state)).toBe(
      'Try to get their exact UPI ID and the receiver name shown on screen. ' +
        'Say the OTP has not arrived; ask for the steps or a link instead.',
    );
  });

  it('drops the OTP hint once the current message stops asking for it', () => {
    const state = makeState({ text: 'Your KYC is suspended, refund pending, verify immediately' });
    state.evidence.keywords.add('otp');
    expect(contextHint(state)).toBe('Ask which bank this is, the exact steps, and the link or UPI ID to use.');
  });

  it('uses the generic prompt when nothing is known yet', () => {
    expect(contextHint(makeState())).toBe('Ask which bank this is, the exact steps, and the link or UPI ID to use.');
  });
});

describe('buildTurns', () => {
  it('places the persona first, history next and the latest message last', () => {
    const turns = buildTurns(
      makeState({
        text: 'Send the code',
        history: [
          { sender: 'scammer', text: 'Hello sir', timestamp: 1 },
          { sender: 'user', text: 'Who is this?', timestamp: 2 },
        ],
      }),
    );

    expect(turns).toEqual([
      { role: 'system', content: PERSONA_PROMPT },
      { role: 'user', content: 'Hello sir' },
      { role: 'assistant', content: 'Who is this?' },
      {
        role: 'user',
        content:
          'Latest scammer message: Send the code\n\nGuidance: Ask which bank this is, the exact steps, and the link or UPI ID to use.',
      },
    ]);
  });

  it('forbids sharing secrets in the persona', () => {
    expect(PERSONA_PROMPT).toContain('Never share an OTP, PIN, CVV, password');
  });
});

describe('firstLine', () => {
  it('throws a malformed generation error on blank text', () => {
    expect(() => firstLine('')).toThrowError(GenerationError);
  });
});
