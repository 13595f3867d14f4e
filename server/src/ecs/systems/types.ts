// ============================================
// ECS System Types
// ============================================

import type { World } from '#shared';

/**
 * Base System interface
 * All game systems implement this interface
 */
export interface System {
  /** System name for debugging/logging */
  readonly name: string;

  /**
   * Called every game tick
   * @param world The ECS World containing all entities and components
   * @param deltaTime Time since last tick in seconds
   */
  update(world: World, deltaTime: number): void;
}

/**
 * System priority - determines update order
 * Lower numbers run first
 */
export const SystemPriority = {
  // Economy - before anything spends mana this tick
  MANA: 100,
} as const;
