import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  chance,
  createSeededRandom,
  createSequenceRandom,
  deriveSeed,
  weightedDraw,
} from './random.js';

describe('random sources', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('createSeededRandom', () => {
    it('should replay the same stream for the same seed', () => {
      const a = createSeededRandom(42);
      const b = createSeededRandom(42);

      for (let i = 0; i < 100; i++) {
        expect(a()).toBe(b());
      }
    });

    it('should produce values in [0, 1)', () => {
      const random = createSeededRandom(7);
      for (let i = 0; i < 10_000; i++) {
        const value = random();
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(1);
      }
    });

    it('should produce different streams for different seeds', () => {
      const a = createSeededRandom(1);
      const b = createSeededRandom(2);
      const first = [a(), a(), a()];
      const second = [b(), b(), b()];

      expect(first).not.toEqual(second);
    });
  });

  describe('deriveSeed', () => {
    it('should be deterministic and vary by index', () => {
      expect(deriveSeed(99, 0)).toBe(deriveSeed(99, 0));

      const seeds = new Set<number>();
      for (let i = 0; i < 1000; i++) {
        seeds.add(deriveSeed(99, i));
      }
      expect(seeds.size).toBe(1000);
    });
  });

  describe('chance', () => {
    it('should succeed only when the draw is below the probability', () => {
      expect(chance(0.3, () => 0.29)).toBe(true);
      expect(chance(0.3, () => 0.3)).toBe(false);
      expect(chance(0, () => 0)).toBe(false);
      expect(chance(1, () => 0.999)).toBe(true);
    });
  });

  describe('weightedDraw', () => {
    const candidates = [
      { value: 'a', weight: 1 },
      { value: 'b', weight: 3 },
    ];

    it('should pick proportionally to weight', () => {
      expect(weightedDraw(candidates, () => 0.2)).toBe('a');
      expect(weightedDraw(candidates, () => 0.25)).toBe('b');
      expect(weightedDraw(candidates, () => 0.99)).toBe('b');
    });

    it('should never pick a zero-weight candidate', () => {
      const picks = [0, 0.5, 0.999].map((r) =>
        weightedDraw(
          [
            { value: 'never', weight: 0 },
            { value: 'always', weight: 2 },
          ],
          () => r
        )
      );
      expect(picks).toEqual(['always', 'always', 'always']);
    });

    it('should pick uniformly when every weight is zero', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const zeroes = [
        { value: 'x', weight: 0 },
        { value: 'y', weight: 0 },
      ];

      expect(weightedDraw(zeroes, () => 0.6)).toBe('y');
      expect(weightedDraw(zeroes, () => 0.1)).toBe('x');
      expect(warn).toHaveBeenCalledTimes(2);
    });

    it('should consume exactly one draw', () => {
      const random = vi.fn(() => 0.5);
      weightedDraw(candidates, random);
      expect(random).toHaveBeenCalledTimes(1);
    });

    it('should reject an empty candidate list', () => {
      expect(() => weightedDraw([], () => 0)).toThrow(RangeError);
    });
  });

  describe('createSequenceRandom', () => {
    it('should cycle through the scripted values', () => {
      const random = createSequenceRandom([0.1, 0.2]);
      expect([random(), random(), random()]).toEqual([0.1, 0.2, 0.1]);
    });
  });
});
