import { describe, it, expect } from 'vitest';
import { failed, succeeded } from '../model/model-response.js';
import { anonymizeAnswers } from './anonymize.js';
import { buildPeerReviewPrompt } from './prompts.js';

const stage1 = {
  codex: succeeded('codex', 'Use a queue.', 1),
  gemini: failed('gemini', 'Exit code 1: quota', 1),
};

describe('anonymizeAnswers', () => {
  it('should label backends in fixed order', () => {
    const [answers, labelMap] = anonymizeAnswers(stage1);
    expect(answers).toEqual([
      { label: 'Model A', source: 'codex', text: 'Use a queue.' },
      { label: 'Model B', source: 'gemini', text: '[failed to respond]' },
    ]);
    expect(labelMap).toEqual({ 'Model A': 'codex', 'Model B': 'gemini' });
  });

  it('should put the caller opinion first', () => {
    const [answers, labelMap] = anonymizeAnswers(stage1, 'Use a cron job.');
    expect(answers.map((a) => a.label)).toEqual(['Model A', 'Model B', 'Model C']);
    expect(labelMap).toEqual({ 'Model A': 'claude', 'Model B': 'codex', 'Model C': 'gemini' });
    expect(answers[0].text).toBe('Use a cron job.');
  });

  it('should ignore a blank caller opinion', () => {
    const [answers] = anonymizeAnswers(stage1, '   ');
    expect(answers).toHaveLength(2);
  });
});

describe('buildPeerReviewPrompt', () => {
  it('should list every answer under its label and end with the ranking template', () => {
    const [answers] = anonymizeAnswers(stage1);
    const prompt = buildPeerReviewPrompt('How to schedule jobs?', answers);

    expect(prompt).toContain('Question: How to schedule jobs?\n\n=== Model A ===\nUse a queue.\n\n=== Model B ===\n[failed to respond]\n\n');
    expect(prompt.endsWith('FINAL RANKING:\n1. Model A\n2. Model B')).toBe(true);
    expect(prompt).not.toContain('codex');
  });
});
