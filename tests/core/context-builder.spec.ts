import { describe, expect, it } from 'vitest';
import { ContextBuilder, SYSTEM_INSTRUCTION, previewText } from '../../src/core/context-builder.js';

describe('previewText', () => {
  it('collapses whitespace', () => {
    expect(previewText('  restart\n\n nginx\tthen   check ')).toBe('restart nginx then check');
  });

  it('cuts long text to the limit with an ellipsis', () => {
    const preview = previewText('x'.repeat(200));
    expect(preview).toHaveLength(160);
    expect(preview.endsWith('x…')).toBe(true);
  });
});

describe('ContextBuilder', () => {
  it('lays out system, question, cited snippets and instructions', () => {
    const built = new ContextBuilder().build('  why is /var full? ', [
      { id: 11, source: 'disk.md', content: 'Rotate logs.\n' },
    ]);

    expect(built.prompt.startsWith(`SYSTEM:\n${SYSTEM_INSTRUCTION}\n\nQUESTION:\nwhy is /var full?\n\n`)).toBe(true);
    expect(built.prompt).toContain('RUNBOOK SNIPPETS (with citations):\n\n[chunk:11 source:disk.md]\nRotate logs.\n');
    expect(built.prompt.endsWith('summarize the closest snippets.\n')).toBe(true);
    expect(built.citations).toEqual([{ chunkId: 11, source: 'disk.md', preview: 'Rotate logs.' }]);
    expect(built.charEstimate).toBe(built.prompt.length);
  });

  it('says so when there are no snippets', () => {
    const built = new ContextBuilder().build('q', []);
    expect(built.prompt).toContain('RUNBOOK SNIPPETS: (none available)\n');
    expect(built.citations).toEqual([]);
  });

  it('trims the snippet tail to stay under the budget', () => {
    const built = new ContextBuilder(600).build('why?', [
      { id: 1, source: 'big.md', content: 'y'.repeat(2000) },
    ]);

    expect(built.prompt).toHaveLength(581);
    expect(built.prompt).toContain('QUESTION:\nwhy?\n');
    expect(built.prompt).toContain('[chunk:1 source:big.md]');
    expect(built.citations).toHaveLength(1);
  });
});
