import type { AnimationClipSpec, AnimationKind, BehaviorRepertoire } from '#shared';
import { GAME_CONFIG } from '#shared';

/**
 * Build a clip spec from the compact tuple form the unit files use.
 * Clips loop and are state-driven unless flags say otherwise.
 */
export function clip(
  spriteSheet: string,
  [width, height]: [number, number],
  [columns, rows]: [number, number],
  frameCount: number,
  kind: AnimationKind,
  flags: { loops?: boolean; attackTriggered?: boolean } = {}
): AnimationClipSpec {
  return {
    spriteSheet,
    frameSize: { width, height },
    grid: { columns, rows },
    frameCount,
    kind,
    loops: flags.loops ?? true,
    attackTriggered: flags.attackTriggered ?? false,
  };
}

/**
 * Repertoire for unit types with no special behaviors: idle only.
 * Opt-in - a composition must return this explicitly.
 */
export function defaultBehaviorRepertoire(): BehaviorRepertoire {
  return {
    initialBehavior: 'idle',
    entries: [{ kind: 'idle', priorityWeight: GAME_CONFIG.DEFAULT_IDLE_WEIGHT }],
  };
}
