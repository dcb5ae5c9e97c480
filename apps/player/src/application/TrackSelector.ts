/**
 * TrackSelector - picks the next library entry for a selection policy
 */

import {
  Library,
  RandomSource,
  Result,
  Selection,
  SelectionError,
  SelectionPolicy,
  SelectionState,
  SelectionValidator
} from '@dirplay/shared';
import { ITrackSelector } from '../domain/playback/interfaces';

export class TrackSelector implements ITrackSelector {
  private readonly random: RandomSource;

  constructor(random: RandomSource = Math.random) {
    this.random = random;
  }

  selectNext(
    library: Library,
    policy: SelectionPolicy,
    state: SelectionState
  ): Result<Selection, SelectionError> {
    const count = library.files.length;
    if (count === 0) {
      return { success: false, error: 'EMPTY_LIBRARY' };
    }

    switch (policy) {
      case 'sequential':
        return this.selectSequential(library, state);
      case 'random':
        return this.selectRandom(library, state);
      case 'search-pick':
        return this.selectPicked(library, state);
    }
  }

  /**
   * Cursor past the end wraps back to 1, so list play loops forever
   */
  private selectSequential(library: Library, state: SelectionState): Result<Selection, SelectionError> {
    const count = library.files.length;
    const index = SelectionValidator.isInRange(state.cursor, count) ? state.cursor : 1;

    return {
      success: true,
      value: {
        filePath: library.files[index - 1],
        index,
        state: { cursor: index + 1 }
      }
    };
  }

  /**
   * Independent uniform draw over [1, N]; immediate repeats are allowed
   */
  private selectRandom(library: Library, state: SelectionState): Result<Selection, SelectionError> {
    const count = library.files.length;
    const drawn = Math.floor(this.random() * count) + 1;
    const index = Math.min(count, Math.max(1, drawn));

    return {
      success: true,
      value: {
        filePath: library.files[index - 1],
        index,
        state
      }
    };
  }

  private selectPicked(library: Library, state: SelectionState): Result<Selection, SelectionError> {
    if (!SelectionValidator.isInRange(state.cursor, library.files.length)) {
      return { success: false, error: 'INVALID_SELECTION' };
    }

    return {
      success: true,
      value: {
        filePath: library.files[state.cursor - 1],
        index: state.cursor,
        state
      }
    };
  }
}
