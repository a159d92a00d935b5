import { describe, it, expect } from 'vitest';
import type { Thought } from '@synaptic/shared';
import { decodeRelation, decodeThought, encodeResult, encodeThought, decodeResult } from '../src/codecs.js';
import { at, uuid } from './helpers.js';

const thought: Thought = {
  id: uuid(1),
  sessionId: 'session-a',
  type: 'Analytical',
  origin: 'Autonomous',
  content: 'compare the two plans',
  confidence: 0.7,
  relevance: 0.4,
  timestamp: at(1),
};

describe('thought codec', () => {
  it('stores an absent topic as an empty string', () => {
    expect(encodeThought('session-a', thought)).toEqual({
      id: uuid(1),
      session_id: 'session-a',
      type: 'Analytical',
      origin: 'Autonomous',
      content: 'compare the two plans',
      confidence: 0.7,
      relevance: 0.4,
      timestamp: at(1),
      topic: '',
    });
  });

  it('decodes what it encodes, optional fields included', () => {
    const full: Thought = {
      ...thought,
      topic: 'planning',
      parentThoughtId: uuid(9),
      tags: ['a', 'b'],
      metadata: { step: 3, nested: { ok: true } },
    };
    expect(decodeThought(encodeThought('session-a', full))).toEqual({ ok: true, value: full });
  });

  it('keeps caller-defined thought types', () => {
    const decoded = decodeThought(encodeThought('session-a', { ...thought, type: 'Daydream' }));
    expect(decoded.ok && decoded.value.type).toBe('Daydream');
  });

  it('fails on a missing field', () => {
    const { content: _content, ...payload } = encodeThought('session-a', thought);
    const decoded = decodeThought(payload);
    expect(decoded.ok).toBe(false);
  });

  it('fails on metadata that is not a JSON object', () => {
    const decoded = decodeThought({ ...encodeThought('session-a', thought), metadata_json: '[1,2]' });
    expect(decoded).toEqual({ ok: false, error: 'metadata_json: not a JSON object' });
  });
});

describe('relation codec', () => {
  it('rejects an unknown relation type', () => {
    const decoded = decodeRelation({
      id: uuid(5),
      session_id: 's',
      source_thought_id: uuid(1),
      target_thought_id: uuid(2),
      relation_type: 'implies',
      strength: 0.5,
      created_at: at(0),
    });
    expect(decoded.ok).toBe(false);
  });
});

describe('result codec', () => {
  it('round-trips execution time and success', () => {
    const result = {
      id: uuid(7),
      thoughtId: uuid(1),
      resultType: 'action' as const,
      content: 'ran the migration',
      success: false,
      confidence: 0.3,
      createdAt: at(2),
      executionTimeMs: 120,
    };
    const payload = encodeResult('s', result);
    expect(payload.execution_time_ms).toBe(120);
    expect(decodeResult(payload)).toEqual({ ok: true, value: result });
  });
});
