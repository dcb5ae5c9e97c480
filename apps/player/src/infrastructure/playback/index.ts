/**
 * Playback infrastructure exports
 */

export { ProcessManager, ChildPlaybackHandle } from './ProcessManager';
export type { PlayerProcess, SpawnPlayer } from './ProcessManager';
