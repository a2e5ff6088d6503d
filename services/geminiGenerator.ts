import { GoogleGenAI, type Content } from '@google/genai';
import { GenerationError, errorMessage } from '../errors.js';
import type { ChatTurn, GenerateOptions, Generator } from '../types.js';

export interface GeminiGeneratorOptions {
  apiKey?: string;
  model: string;
  temperature?: number;
}

export function toGeminiRequest(turns: ChatTurn[]): { systemInstruction: string; contents: Content[] } {
  const systemInstruction = turns
    .filter((turn) => turn.role === 'system')
    .map((turn) => turn.content)
    .join('\n\n');

  const contents = turns
    .filter((turn) => turn.role !== 'system')
    .map((turn) => ({
      role: turn.role === 'assistant' ? 'model' : 'user',
      parts: [{ text: turn.content }],
    }));

  return { systemInstruction, contents };
}

export class GeminiGenerator implements Generator {
  private readonly ai: GoogleGenAI | null;

  constructor(private readonly options: GeminiGeneratorOptions) {
    this.ai = options.apiKey ? new GoogleGenAI({ apiKey: options.apiKey }) : null;
  }

  get configured(): boolean {
    return this.ai !== null;
  }

  async generate(turns: ChatTurn[], { maxTokens, signal }: GenerateOptions): Promise<string> {
    if (!this.ai) throw new GenerationError('service', 'API_KEY is not configured');

    const { systemInstruction, contents } = toGeminiRequest(turns);

    try {
      const response = await this.ai.models.generateContent({
        model: this.options.model,
        contents,
        config: {
          systemInstruction,
          maxOutputTokens: maxTokens,
          temperature: this.options.temperature ?? 0.7,
          topP: 0.9,
          abortSignal: signal,
        },
      });

      const text = response.text;
      if (typeof text !== 'string') {
        throw new GenerationError('malformed', 'Gemini returned no text candidate');
      }
      return text;
    } catch (error) {
      if (error instanceof GenerationError) throw error;
      if (signal.aborted) throw new GenerationError('timeout', 'Gemini request aborted');
      throw new GenerationError('service', `Gemini error: ${errorMessage(error)}`);
    }
  }
}
