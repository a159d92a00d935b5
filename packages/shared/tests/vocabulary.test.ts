import { describe, it, expect } from 'vitest';
import {
  classifyThoughtType,
  classifyThoughtOrigin,
  isRelationType,
  isMemoryLayer,
  isDistanceMetric,
} from '../src/vocabulary.js';

describe('thought type classification', () => {
  it('recognizes known tags', () => {
    expect(classifyThoughtType('Analytical')).toEqual({ kind: 'known', type: 'Analytical' });
    expect(classifyThoughtType('SelfReflection')).toEqual({ kind: 'known', type: 'SelfReflection' });
  });

  it('keeps unknown tags as other', () => {
    expect(classifyThoughtType('Daydream')).toEqual({ kind: 'other', value: 'Daydream' });
  });

  it('is case-sensitive', () => {
    expect(classifyThoughtType('analytical')).toEqual({ kind: 'other', value: 'analytical' });
  });

  it('classifies origins', () => {
    expect(classifyThoughtOrigin('Chained')).toEqual({ kind: 'known', origin: 'Chained' });
    expect(classifyThoughtOrigin('Scheduled')).toEqual({ kind: 'other', value: 'Scheduled' });
  });
});

describe('closed vocabularies', () => {
  it('accepts only listed relation types', () => {
    expect(isRelationType('refines')).toBe(true);
    expect(isRelationType('implies')).toBe(false);
  });

  it('accepts only the five memory layers', () => {
    expect(isMemoryLayer('episodic')).toBe(true);
    expect(isMemoryLayer('sensory')).toBe(false);
  });

  it('accepts only supported distance metrics', () => {
    expect(isDistanceMetric('manhattan')).toBe(true);
    expect(isDistanceMetric('hamming')).toBe(false);
  });
});
