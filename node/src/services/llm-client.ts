// node/src/services/llm-client.ts: generation backends behind one text-in/text-out contract

import OpenAI from 'openai';
import axios from 'axios';
import { CollaboratorError } from '@/utils/errors';
import type { HttpPoster } from '@/utils/http';

export interface LlmClient {
  complete(prompt: string): Promise<string>;
}

const SYSTEM_PROMPT = 'Return exactly what the user asks. No extra text.';
const TEMPERATURE = 0.2;

export interface OpenAILlmClientOptions {
  apiKey: string;
  model: string;
  timeoutMs?: number;
}

export class OpenAILlmClient implements LlmClient {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(options: OpenAILlmClientOptions, client?: OpenAI) {
    this.client = client ?? new OpenAI({ apiKey: options.apiKey, timeout: options.timeoutMs });
    this.model = options.model;
  }

  async complete(prompt: string): Promise<string> {
    const res = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: prompt },
      ],
      temperature: TEMPERATURE,
    });
    return res.choices[0]?.message?.content ?? '';
  }
}

export interface OllamaLlmClientOptions {
  baseUrl: string;
  model: string;
  timeoutMs?: number;
}

export class OllamaLlmClient implements LlmClient {
  private readonly http: HttpPoster;

  constructor(
    private readonly options: OllamaLlmClientOptions,
    http?: HttpPoster,
  ) {
    this.http =
      http ?? axios.create({ baseURL: options.baseUrl, timeout: options.timeoutMs ?? 60_000 });
  }

  async complete(prompt: string): Promise<string> {
    const { data } = await this.http.post<unknown>('/api/chat', {
      model: this.options.model,
      messages: [{ role: 'user', content: prompt }],
      stream: false,
      options: { temperature: TEMPERATURE },
    });
    const content = readOllamaContent(data);
    if (content === undefined) {
      throw new CollaboratorError('llm', 'Ollama response is missing message.content');
    }
    return content;
  }
}

function readOllamaContent(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null || !('message' in data)) return undefined;
  const message = data.message;
  if (typeof message !== 'object' || message === null || !('content' in message)) return undefined;
  return typeof message.content === 'string' ? message.content : undefined;
}
