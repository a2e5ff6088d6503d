import { GenerationError, errorMessage } from '../errors.js';
import type { ChatTurn, GenerateOptions, Generator } from '../types.js';
import { drainBody, type FetchLike } from './http.js';

export const OPENROUTER_URL = 'https://openrouter.ai/api/v1/chat/completions';

export interface OpenRouterGeneratorOptions {
  apiKey?: string;
  model: string;
  url?: string;
  temperature?: number;
  fetchImpl?: FetchLike;
}

function contentOf(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null || !('choices' in data)) return undefined;
  const { choices } = data;
  if (!Array.isArray(choices) || choices.length === 0) return undefined;

  const first: unknown = choices[0];
  if (typeof first !== 'object' || first === null || !('message' in first)) return undefined;
  const { message } = first;
  if (typeof message !== 'object' || message === null || !('content' in message)) return undefined;

  return typeof message.content === 'string' ? message.content : undefined;
}

export class OpenRouterGenerator implements Generator {
  constructor(private readonly options: OpenRouterGeneratorOptions) {}

  get configured(): boolean {
    return Boolean(this.options.apiKey);
  }

  async generate(turns: ChatTurn[], { maxTokens, signal }: GenerateOptions): Promise<string> {
    const { apiKey, model, url = OPENROUTER_URL, temperature = 0.7, fetchImpl = fetch } = this.options;
    if (!apiKey) throw new GenerationError('service', 'API_KEY is not configured');

    let response: Response;
    try {
      response = await fetchImpl(url, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ model, messages: turns, max_tokens: maxTokens, temperature, top_p: 0.9 }),
        signal,
      });
    } catch (error) {
      if (signal.aborted) throw new GenerationError('timeout', 'OpenRouter request aborted');
      throw new GenerationError('service', `OpenRouter transport error: ${errorMessage(error)}`);
    }

    if (!response.ok) {
      const errText = await drainBody(response);
      throw new GenerationError('service', `AI API error [${response.status}]: ${errText.slice(0, 200)}`);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch {
      throw new GenerationError('malformed', 'OpenRouter returned invalid JSON');
    }

    const content = contentOf(data);
    if (content === undefined) {
      throw new GenerationError('malformed', `AI returned unexpected format: ${JSON.stringify(data).slice(0, 200)}`);
    }
    return content;
  }
}
