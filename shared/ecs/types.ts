// ============================================
// ECS Core Types
// ============================================

import type { BehaviorKind } from '../types';

/**
 * Entity ID - just a number.
 * Entities have no data themselves, they're just IDs that
 * components are attached to.
 */
export type EntityId = number;

/**
 * Component type identifier - string key for component stores.
 */
export type ComponentType = string;

/**
 * Standard component types used throughout the ECS.
 * Using const object for type safety while keeping string values.
 */
export const Components = {
  // Unit base bundle
  Unit: 'Unit',
  Movement: 'Movement',
  Velocity: 'Velocity',
  Health: 'Health',
  Transform: 'Transform',
  Team: 'Team',
  CurrentAnimation: 'CurrentAnimation',

  // Behavior repertoire holder (full weighted list + active kind)
  Behaviors: 'Behaviors',

  // Behavior presence markers - one per legal behavior kind
  IdleBehavior: 'IdleBehavior',
  WanderBehavior: 'WanderBehavior',
  MoveToOriginBehavior: 'MoveToOriginBehavior',
  ChaseBehavior: 'ChaseBehavior',
  FleeBehavior: 'FleeBehavior',
  AttackBehavior: 'AttackBehavior',
  DeadBehavior: 'DeadBehavior',

  // Visual children
  AnimatedSprite: 'AnimatedSprite',

  // Support abilities
  ManaGenerator: 'ManaGenerator',
} as const;

/**
 * Marker component for each behavior kind.
 * The AI loop checks "can entity E do B" by presence of BehaviorMarkers[B].
 */
export const BehaviorMarkers = {
  idle: Components.IdleBehavior,
  wander: Components.WanderBehavior,
  moveToOrigin: Components.MoveToOriginBehavior,
  chase: Components.ChaseBehavior,
  flee: Components.FleeBehavior,
  attack: Components.AttackBehavior,
  dead: Components.DeadBehavior,
} as const satisfies Record<BehaviorKind, ComponentType>;

/**
 * Entity tags for quick type identification.
 * Tags are lightweight - just a Set<string> per entity.
 */
export const Tags = {
  Unit: 'unit',
  AnimationChild: 'animation_child',

  // Level teardown destroys everything carrying this tag
  Cleanup: 'cleanup',
} as const;

// ============================================
// Resource Keys
// ============================================

/**
 * Standard resource keys for world.getResource/setResource.
 * Resources are singleton data not tied to entities.
 */
export const Resources = {
  ManaPools: 'manaPools',
} as const;
