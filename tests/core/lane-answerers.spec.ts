import { beforeEach, describe, expect, it, vi } from 'vitest';
import { db } from '../../src/services/db.js';
import { RunbookStore } from '../../src/services/grounding/runbook-store.js';
import { RunbookRetriever } from '../../src/services/grounding/runbook-retriever.js';
import { ContextBuilder } from '../../src/core/context-builder.js';
import { CloudDirectAnswerer, OnDeviceRagAnswerer, buildCloudPrompt } from '../../src/core/lane-answerers.js';
import type { GenerateOptions, LlmProvider, LlmResult } from '../../src/services/llm-providers.js';

function spyProvider(name: string, text: string) {
  const generate = vi.fn(async (_prompt: string, _options?: GenerateOptions): Promise<LlmResult> => ({
    text,
    provider: name,
    tokenEstimate: 12,
  }));
  const provider: LlmProvider = { name, generate };
  return { provider, generate };
}

describe('OnDeviceRagAnswerer', () => {
  beforeEach(() => {
    db.exec('DELETE FROM runbook_chunks;');
  });

  it('grounds the prompt in retrieved runbook chunks and cites them', async () => {
    const store = new RunbookStore();
    const [chunkId] = store.ingest('disk.md', ['When the disk is full rotate logs with logrotate -f.']);
    store.ingest('nginx.md', ['Restart nginx with systemctl restart nginx.']);
    const { provider, generate } = spyProvider('ollama_local', 'Rotate logs [chunk:1].');

    const answerer = new OnDeviceRagAnswerer({
      provider,
      retriever: new RunbookRetriever(store),
      builder: new ContextBuilder(),
    });
    const attempt = await answerer.answer('disk full?');

    expect(attempt.answer).toBe('Rotate logs [chunk:1].');
    expect(attempt.provider).toBe('ollama_local');
    expect(attempt.tokenEstimate).toBe(12);
    expect(attempt.citations).toEqual([
      { chunkId, source: 'disk.md', preview: 'When the disk is full rotate logs with logrotate -f.' },
    ]);
    const prompt = generate.mock.calls[0]?.[0] ?? '';
    expect(prompt).toContain(`[chunk:${chunkId} source:disk.md]`);
    expect(prompt).not.toContain('nginx.md');
    expect(attempt.charEstimate).toBe(prompt.length);
  });

  it('passes the abort signal through to the provider', async () => {
    const { provider, generate } = spyProvider('ollama_local', 'x');
    const answerer = new OnDeviceRagAnswerer({
      provider,
      retriever: new RunbookRetriever(new RunbookStore()),
      builder: new ContextBuilder(),
    });
    const controller = new AbortController();

    await answerer.answer('anything', { signal: controller.signal });

    expect(generate.mock.calls[0]?.[1]).toEqual({ signal: controller.signal });
    expect(answerer.providerName).toBe('ollama_local');
  });
});

describe('CloudDirectAnswerer', () => {
  it('sends the bare question without citations', async () => {
    const { provider, generate } = spyProvider('cloud_openai', 'Scale the consumers.');
    const answerer = new CloudDirectAnswerer(provider);

    const attempt = await answerer.answer('  kafka lag?  ');

    const expectedPrompt = 'You are an incident assistant. Provide a safe, operational answer. If unsure, say so.\n\n'
      + 'QUESTION:\nkafka lag?\n';
    expect(buildCloudPrompt('  kafka lag?  ')).toBe(expectedPrompt);
    expect(generate.mock.calls[0]?.[0]).toBe(expectedPrompt);
    expect(attempt).toEqual({
      answer: 'Scale the consumers.',
      citations: [],
      provider: 'cloud_openai',
      tokenEstimate: 12,
      charEstimate: expectedPrompt.length,
    });
  });
});
