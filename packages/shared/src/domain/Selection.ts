import type { Result } from './Library';

/**
 * Rule determining which library entry plays next
 */
export type SelectionPolicy = 'sequential' | 'random' | 'search-pick';

/**
 * Playback mode offered by the menu, and the policy each one drives
 */
export type PlaybackMode = 'shuffle' | 'list' | 'search';

export const MODE_POLICIES: Readonly<Record<PlaybackMode, SelectionPolicy>> = {
  shuffle: 'random',
  list: 'sequential',
  search: 'search-pick'
};

/**
 * Cursor threaded through selectNext. 1-based.
 * Sequential advances it, random ignores it, search-pick reads the chosen index.
 */
export interface SelectionState {
  readonly cursor: number;
}

export interface Selection {
  readonly filePath: string;
  readonly index: number;
  readonly state: SelectionState;
}

export type SelectionError = 'INVALID_SELECTION' | 'EMPTY_LIBRARY';

/**
 * Source of uniform numbers in [0, 1)
 */
export type RandomSource = () => number;

export class SelectionValidator {
  static initialState(): SelectionState {
    return { cursor: 1 };
  }

  static isContinuous(policy: SelectionPolicy): boolean {
    return policy !== 'search-pick';
  }

  static isInRange(index: number, count: number): boolean {
    return Number.isInteger(index) && index >= 1 && index <= count;
  }

  /**
   * Parse a typed menu index. Only plain digit strings are accepted.
   */
  static parseSelectionIndex(input: string, count: number): Result<number, 'INVALID_SELECTION'> {
    const trimmed = input.trim();
    if (!/^[0-9]+$/.test(trimmed)) {
      return { success: false, error: 'INVALID_SELECTION' };
    }

    const index = parseInt(trimmed, 10);
    if (!this.isInRange(index, count)) {
      return { success: false, error: 'INVALID_SELECTION' };
    }

    return { success: true, value: index };
  }
}
