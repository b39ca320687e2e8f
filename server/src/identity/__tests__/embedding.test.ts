import { describe, expect, it } from 'vitest';
import { averageEmbeddings, cosineSimilarity, dot, l2Normalize } from '../embedding.js';
import { boxArea, largestFace } from '../embedders.js';
import { face, vectorAt } from '../../__tests__/fakes.js';

describe('l2Normalize', () => {
  it('scales a vector to unit length', () => {
    const out = l2Normalize([3, 4]);
    expect(out[0]).toBeCloseTo(0.6, 6);
    expect(out[1]).toBeCloseTo(0.8, 6);
  });

  it('leaves a zero vector at zero', () => {
    expect(Array.from(l2Normalize([0, 0, 0]))).toEqual([0, 0, 0]);
  });
});

describe('cosineSimilarity', () => {
  it('is 1 for a vector compared with a scaled copy of itself', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 5);
  });

  it('is -1 for opposite vectors', () => {
    expect(cosineSimilarity([1, 0], [-1, 0])).toBeCloseTo(-1, 5);
  });

  it('matches the angle between unit vectors', () => {
    expect(cosineSimilarity(vectorAt(0), vectorAt(Math.PI / 3))).toBeCloseTo(0.5, 5);
  });

  it('rejects vectors of different lengths', () => {
    expect(() => dot([1, 2], [1, 2, 3])).toThrow(RangeError);
  });

  it('stays inside [-1, 1]', () => {
    const v = [0.1, 0.2, 0.3, 0.4];
    const sim = cosineSimilarity(v, v);
    expect(sim).toBeLessThanOrEqual(1);
    expect(sim).toBeGreaterThan(0.9999);
  });
});

describe('averageEmbeddings', () => {
  it('weighs every sample equally regardless of its magnitude', () => {
    const mean = averageEmbeddings([[10, 0], [0, 1]]);
    expect(mean[0]).toBeCloseTo(Math.SQRT1_2, 5);
    expect(mean[1]).toBeCloseTo(Math.SQRT1_2, 5);
  });

  it('returns a profile that matches its own samples', () => {
    const sample = [0.2, -0.4, 0.9, 0.1];
    const profile = averageEmbeddings([sample, sample, sample]);
    expect(cosineSimilarity(profile, sample)).toBeCloseTo(1, 5);
  });

  it('throws on an empty list', () => {
    expect(() => averageEmbeddings([])).toThrow(RangeError);
  });
});

describe('largestFace', () => {
  it('picks the face with the biggest box', () => {
    const small = face(vectorAt(0), 5);
    const big = face(vectorAt(1), 20);
    expect(largestFace([small, big, small])).toBe(big);
    expect(boxArea(big)).toBe(400);
  });

  it('returns null when there is no face', () => {
    expect(largestFace([])).toBeNull();
  });
});
