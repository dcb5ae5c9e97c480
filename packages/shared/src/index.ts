/**
 * Shared types and contracts for dirplay
 *
 * Domain values used by the player app: the library snapshot, selection
 * policies and state, and the error types for both.
 */

// Library snapshot
export type { Library, LibraryScanOptions, LibraryError, Result } from './domain/Library';
export { LibraryFactory, MEDIA_EXTENSIONS } from './domain/Library';

// Selection
export type {
  SelectionPolicy,
  PlaybackMode,
  SelectionState,
  Selection,
  SelectionError,
  RandomSource
} from './domain/Selection';
export { SelectionValidator, MODE_POLICIES } from './domain/Selection';

// Error types and utilities
export type { ErrorDetails } from './domain/errors';
export { ErrorFactory } from './domain/errors';
