import OpenAI from 'openai';
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { Model } from 'openai/resources/models';
import { config } from './config.js';

export interface HealthStatus { available: boolean; message: string; }

/** Narrative text for a finished diagnosis. Implementations never reject. */
export interface TextGenerator {
  generate(symptoms: string[], context: string): Promise<string>;
  healthCheck(): Promise<HealthStatus>;
}

/** The slice of the OpenAI client this service calls. */
export interface CompletionClient {
  chat: { completions: { create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion> } };
  models: { retrieve(model: string): Promise<Model> };
}

export const DIAGNOSIS_SYSTEM_PROMPT = `Provide plant disease diagnosis with:
1) Symptom analysis
2) Disease identification
3) Treatment recommendations
4) Prevention measures`;

export const UNAVAILABLE_PREFIX = 'Diagnosis text unavailable';

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

let _client: OpenAI | null = null;
function getClient(): OpenAI {
  if (_client) return _client;
  _client = new OpenAI({
    apiKey: config.llm.apiKey,
    baseURL: config.llm.baseURL,
    timeout: config.llm.timeoutMs,
    maxRetries: 0
  });
  return _client;
}

export class LlmTextGenerator implements TextGenerator {
  private readonly client: CompletionClient;
  private readonly model: string;

  constructor(opts: { client?: CompletionClient; model?: string } = {}) {
    this.client = opts.client ?? getClient();
    this.model = opts.model ?? config.llm.model;
  }

  async generate(symptoms: string[], context: string): Promise<string> {
    try {
      const resp = await this.client.chat.completions.create({
        model: this.model,
        temperature: 0.6,
        max_tokens: 500,
        messages: [
          { role: 'system', content: DIAGNOSIS_SYSTEM_PROMPT },
          { role: 'user', content: `CONTEXT: ${context}\nSYMPTOMS: ${symptoms.join(', ')}` }
        ]
      });
      const text = resp.choices[0]?.message?.content?.trim();
      if (!text) return `${UNAVAILABLE_PREFIX}: empty response from ${this.model}`;
      return text;
    } catch (err) {
      console.error('[LLM] generate failed:', reasonOf(err));
      return `${UNAVAILABLE_PREFIX}: ${reasonOf(err)}`;
    }
  }

  async healthCheck(): Promise<HealthStatus> {
    try {
      await this.client.models.retrieve(this.model);
      return { available: true, message: `${this.model} available` };
    } catch (err) {
      if (err instanceof OpenAI.NotFoundError) {
        return { available: false, message: `${this.model} not found` };
      }
      return { available: false, message: `Connection failed: ${reasonOf(err)}` };
    }
  }
}
