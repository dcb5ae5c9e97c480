/**
 * Property-based tests for typed selection indices
 */

import * as fc from 'fast-check';
import { MODE_POLICIES, SelectionValidator } from '../index';

describe('SelectionValidator', () => {
  it('parses an index inside the listing', () => {
    expect(SelectionValidator.parseSelectionIndex('1', 2)).toEqual({ success: true, value: 1 });
    expect(SelectionValidator.parseSelectionIndex(' 2 ', 2)).toEqual({ success: true, value: 2 });
  });

  it.each(['3', '0', 'abc', '', '-1', '1.5', '+1', '1e1'])('rejects %p for a two-file listing', input => {
    expect(SelectionValidator.parseSelectionIndex(input, 2)).toEqual({
      success: false,
      error: 'INVALID_SELECTION'
    });
  });

  it('maps each mode to its selection policy', () => {
    expect(MODE_POLICIES).toEqual({ shuffle: 'random', list: 'sequential', search: 'search-pick' });
    expect(SelectionValidator.isContinuous('random')).toBe(true);
    expect(SelectionValidator.isContinuous('sequential')).toBe(true);
    expect(SelectionValidator.isContinuous('search-pick')).toBe(false);
  });

  /**
   * Every in-range index round-trips through its decimal form
   */
  test('Property: in-range indices are accepted', () => {
    fc.assert(fc.property(
      fc.integer({ min: 1, max: 500 }).chain(count => fc.tuple(fc.constant(count), fc.integer({ min: 1, max: count }))),
      ([count, index]: [number, number]) => {
        const result = SelectionValidator.parseSelectionIndex(String(index), count);
        return result.success && result.value === index;
      }
    ));
  });

  /**
   * Anything past the end of the listing is refused
   */
  test('Property: out-of-range indices are rejected', () => {
    fc.assert(fc.property(
      fc.integer({ min: 1, max: 500 }),
      fc.integer({ min: 1, max: 1000 }),
      (count: number, excess: number) => {
        const result = SelectionValidator.parseSelectionIndex(String(count + excess), count);
        return !result.success && result.error === 'INVALID_SELECTION';
      }
    ));
  });

  /**
   * Input containing anything but digits never selects a file
   */
  test('Property: non-digit input is rejected', () => {
    fc.assert(fc.property(
      fc.string().filter((s: string) => !/^[0-9]+$/.test(s.trim())),
      (input: string) => !SelectionValidator.parseSelectionIndex(input, 10).success
    ));
  });
});
