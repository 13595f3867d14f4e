// ============================================
// Animation Children
// The spawn path hands each unit's clip list to an instantiator,
// which creates one child entity per clip, owned by the unit.
// ============================================

import { Components, Tags } from '#shared';
import type { AnimatedSpriteComponent, AnimationClipSpec, EntityId, World } from '#shared';

/**
 * Creates the visual child entities for a freshly spawned unit.
 * Implementations must parent every child they create to `parent`
 * and return the child IDs in clip order.
 */
export interface AnimationInstantiator {
  instantiateChildren(world: World, parent: EntityId, clips: readonly AnimationClipSpec[]): EntityId[];
}

/**
 * Default instantiator: one AnimatedSprite child per clip.
 * Only the idle clip starts visible.
 */
export function spawnAnimatedChildren(
  world: World,
  parent: EntityId,
  clips: readonly AnimationClipSpec[]
): EntityId[] {
  return clips.map((clip) => {
    const child = world.createEntity();
    world.addComponent<AnimatedSpriteComponent>(child, Components.AnimatedSprite, {
      clip: { ...clip, frameSize: { ...clip.frameSize }, grid: { ...clip.grid } },
      frame: 0,
      visible: clip.kind === 'idle',
    });
    world.addTag(child, Tags.AnimationChild);
    world.setParent(child, parent);
    return child;
  });
}

export const spriteAnimationInstantiator: AnimationInstantiator = {
  instantiateChildren: spawnAnimatedChildren,
};
