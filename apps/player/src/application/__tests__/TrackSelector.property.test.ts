/**
 * Property-based tests for TrackSelector
 */

import * as fc from 'fast-check';
import { Library, SelectionState } from '@dirplay/shared';
import { TrackSelector } from '../TrackSelector';

function libraryOf(count: number): Library {
  const files = Array.from({ length: count }, (_, i) => `/music/track-${i + 1}.mp3`);
  return { baseDirectory: '/music', files, recursive: false };
}

describe('TrackSelector', () => {
  describe('sequential', () => {
    it('walks the library in order and wraps to the first file', () => {
      const selector = new TrackSelector();
      const library = libraryOf(3);
      let state: SelectionState = { cursor: 1 };
      const indices: number[] = [];

      for (let i = 0; i < 7; i++) {
        const result = selector.selectNext(library, 'sequential', state);
        expect(result.success).toBe(true);
        if (!result.success) return;
        indices.push(result.value.index);
        state = result.value.state;
      }

      expect(indices).toEqual([1, 2, 3, 1, 2, 3, 1]);
    });

    it('restarts from 1 for a cursor outside the library', () => {
      const result = new TrackSelector().selectNext(libraryOf(2), 'sequential', { cursor: 9 });

      expect(result).toEqual({
        success: true,
        value: { filePath: '/music/track-1.mp3', index: 1, state: { cursor: 2 } }
      });
    });

    /**
     * After N + 1 selections the cursor is back where it started
     */
    test('Property: N + 1 selections wrap to the first file', () => {
      fc.assert(fc.property(
        fc.integer({ min: 1, max: 50 }),
        (count: number) => {
          const selector = new TrackSelector();
          const library = libraryOf(count);
          let state = { cursor: 1 };
          let lastIndex = 0;

          for (let i = 0; i <= count; i++) {
            const result = selector.selectNext(library, 'sequential', state);
            if (!result.success) return false;
            lastIndex = result.value.index;
            state = result.value.state;
          }

          return lastIndex === 1;
        }
      ));
    });
  });

  describe('random', () => {
    /**
     * Whatever the random source yields, the index stays within [1, N]
     */
    test('Property: random selection stays within the library', () => {
      fc.assert(fc.property(
        fc.integer({ min: 1, max: 100 }),
        fc.double({ min: 0, max: 1, noNaN: true }),
        (count: number, draw: number) => {
          const selector = new TrackSelector(() => draw);
          const result = selector.selectNext(libraryOf(count), 'random', { cursor: 1 });
          if (!result.success) return false;

          const { index, filePath } = result.value;
          return index >= 1 && index <= count && filePath === `/music/track-${index}.mp3`;
        }
      ));
    });

    it('maps the ends of the random range onto the first and last file', () => {
      const library = libraryOf(4);
      const low = new TrackSelector(() => 0).selectNext(library, 'random', { cursor: 1 });
      const high = new TrackSelector(() => 0.999999).selectNext(library, 'random', { cursor: 1 });

      expect(low.success && low.value.index).toBe(1);
      expect(high.success && high.value.index).toBe(4);
    });

    it('can reach every file', () => {
      const count = 5;
      const draws = [0.05, 0.25, 0.45, 0.65, 0.85];
      let next = 0;
      const selector = new TrackSelector(() => draws[next++ % draws.length]);
      const seen = new Set<number>();

      for (let i = 0; i < count; i++) {
        const result = selector.selectNext(libraryOf(count), 'random', { cursor: 1 });
        if (result.success) seen.add(result.value.index);
      }

      expect([...seen].sort()).toEqual([1, 2, 3, 4, 5]);
    });

    it('leaves the state untouched', () => {
      const state = { cursor: 3 };
      const result = new TrackSelector(() => 0.5).selectNext(libraryOf(4), 'random', state);

      expect(result.success && result.value.state).toBe(state);
    });
  });

  describe('search-pick', () => {
    it('selects the chosen file', () => {
      const library: Library = {
        baseDirectory: '/music',
        files: ['/music/a.mp3', '/music/b.mp3'],
        recursive: true
      };

      const result = new TrackSelector().selectNext(library, 'search-pick', { cursor: 2 });

      expect(result).toEqual({
        success: true,
        value: { filePath: '/music/b.mp3', index: 2, state: { cursor: 2 } }
      });
    });

    it.each([0, 3, -1, 1.5])('rejects cursor %p', cursor => {
      const result = new TrackSelector().selectNext(libraryOf(2), 'search-pick', { cursor });

      expect(result).toEqual({ success: false, error: 'INVALID_SELECTION' });
    });
  });

  it.each(['sequential', 'random', 'search-pick'] as const)('reports an empty library for %s', policy => {
    const result = new TrackSelector().selectNext(libraryOf(0), policy, { cursor: 1 });

    expect(result).toEqual({ success: false, error: 'EMPTY_LIBRARY' });
  });
});
