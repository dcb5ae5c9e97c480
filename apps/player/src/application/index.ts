/**
 * Application layer exports
 */

export { PlaybackSession } from './PlaybackSession';
export { TrackSelector } from './TrackSelector';
