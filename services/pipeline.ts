import { copyEvidence, mergeEvidence, type ChatMessage, type PipelineState, type Session } from '../types.js';
import { extract } from './extractor.js';
import { shouldFinalize } from './finalizePolicy.js';
import { assess } from './scorer.js';

export type StageName = 'detect' | 'extract' | 'decide' | 'reply';

interface Stage {
  name: StageName;
  run(state: PipelineState): void | Promise<void>;
}

export interface ReplyBuilder {
  buildReply(state: PipelineState): Promise<string>;
}

export interface PipelineDeps {
  replies: ReplyBuilder;
  minArtifacts: number;
}

export function seedState(
  session: Session,
  message: Pick<ChatMessage, 'sender' | 'text'>,
  history: ChatMessage[],
  historyWindow: number,
): PipelineState {
  return {
    sessionId: session.id,
    text: message.text,
    sender: message.sender,
    history: historyWindow > 0 ? history.slice(-historyWindow) : [],
    evidence: copyEvidence(session.evidence),
    confidence: 0,
    scamDetected: false,
    shouldFinalize: false,
    reply: '',
  };
}

/**
 * Fixed detect → extract → decide → reply sequence over one message.
 *
 * Extraction runs for every message, scam or not, so evidence accumulates
 * across the whole session. Because the state's evidence was seeded from the
 * session, `decide` sees the cumulative sets including this message.
 */
export class Pipeline {
  readonly stages: readonly Stage[];

  constructor(deps: PipelineDeps) {
    this.stages = [
      {
        name: 'detect',
        run: (state) => {
          const { confidence, scamDetected } = assess(state.text);
          state.confidence = confidence;
          state.scamDetected = scamDetected;
        },
      },
      {
        name: 'extract',
        run: (state) => mergeEvidence(state.evidence, extract(state.text)),
      },
      {
        name: 'decide',
        run: (state) => {
          state.shouldFinalize = shouldFinalize(state.evidence, state.scamDetected, deps.minArtifacts);
        },
      },
      {
        name: 'reply',
        run: async (state) => {
          state.reply = await deps.replies.buildReply(state);
        },
      },
    ];
  }

  async run(state: PipelineState): Promise<PipelineState> {
    for (const stage of this.stages) {
      await stage.run(state);
    }
    return state;
  }
}
