import OpenAI from 'openai';
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { Model } from 'openai/resources/models';
import { describe, expect, it, vi } from 'vitest';
import { DIAGNOSIS_SYSTEM_PROMPT, LlmTextGenerator } from '../src/llmService.js';

function completion(content: string | null): ChatCompletion {
  return {
    id: 'cmpl-test',
    object: 'chat.completion',
    created: 0,
    model: 'test-model',
    choices: [
      {
        index: 0,
        finish_reason: 'stop',
        logprobs: null,
        message: { role: 'assistant', content, refusal: null }
      }
    ]
  };
}

function fakeClient(content: string | null = 'Iron Chlorosis is likely.') {
  return {
    chat: {
      completions: {
        create: vi.fn(async (_body: ChatCompletionCreateParamsNonStreaming) => completion(content))
      }
    },
    models: {
      retrieve: vi.fn(async (id: string): Promise<Model> => ({ id, created: 0, object: 'model', owned_by: 'library' }))
    }
  };
}

describe('LlmTextGenerator.generate', () => {
  it('sends the diagnosis prompt and returns trimmed text', async () => {
    const client = fakeClient('  Iron Chlorosis is likely.  ');
    const llm = new LlmTextGenerator({ client, model: 'test-model' });

    await expect(llm.generate(['yellowing leaves', 'stunted growth'], 'ctx')).resolves.toBe('Iron Chlorosis is likely.');
    expect(client.chat.completions.create).toHaveBeenCalledWith({
      model: 'test-model',
      temperature: 0.6,
      max_tokens: 500,
      messages: [
        { role: 'system', content: DIAGNOSIS_SYSTEM_PROMPT },
        { role: 'user', content: 'CONTEXT: ctx\nSYMPTOMS: yellowing leaves, stunted growth' }
      ]
    });
  });

  it('turns transport failures into text', async () => {
    const client = fakeClient();
    client.chat.completions.create.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));
    const llm = new LlmTextGenerator({ client, model: 'test-model' });

    await expect(llm.generate(['brown spots'], 'ctx')).resolves.toBe('Diagnosis text unavailable: connect ECONNREFUSED');
  });

  it('reports an empty completion', async () => {
    const llm = new LlmTextGenerator({ client: fakeClient(null), model: 'test-model' });
    await expect(llm.generate(['brown spots'], 'ctx')).resolves.toBe('Diagnosis text unavailable: empty response from test-model');
  });
});

describe('LlmTextGenerator.healthCheck', () => {
  it('reports an available model', async () => {
    const client = fakeClient();
    const llm = new LlmTextGenerator({ client, model: 'test-model' });

    await expect(llm.healthCheck()).resolves.toEqual({ available: true, message: 'test-model available' });
    expect(client.models.retrieve).toHaveBeenCalledWith('test-model');
  });

  it('reports a missing model', async () => {
    const client = fakeClient();
    client.models.retrieve.mockRejectedValueOnce(new OpenAI.NotFoundError(404, undefined, 'model not found', undefined));
    const llm = new LlmTextGenerator({ client, model: 'test-model' });

    await expect(llm.healthCheck()).resolves.toEqual({ available: false, message: 'test-model not found' });
  });

  it('reports an unreachable server', async () => {
    const client = fakeClient();
    client.models.retrieve.mockRejectedValueOnce(new Error('fetch failed'));
    const llm = new LlmTextGenerator({ client, model: 'test-model' });

    await expect(llm.healthCheck()).resolves.toEqual({ available: false, message: 'Connection failed: fetch failed' });
  });
});
