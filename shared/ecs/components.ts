// ============================================
// ECS Component Interfaces
// All component data shapes for the ECS
// ============================================

import type {
  AnimationClipSpec,
  AnimationKind,
  BehaviorEntry,
  BehaviorKind,
  Team,
  UnitType,
} from '../types';

// ============================================
// Unit Base Bundle
// Written together by the spawn orchestrator
// ============================================

/**
 * Unit identity - which composition built this entity.
 */
export interface UnitComponent {
  unitType: UnitType;
}

/**
 * Movement - top speed the movement system may accelerate to.
 * Units: world units per second.
 */
export interface MovementComponent {
  speed: number;
}

/**
 * Velocity - current movement vector, integrated by the physics system.
 * Always zero at spawn.
 */
export interface VelocityComponent {
  x: number;
  y: number;
}

/**
 * Health - whole hit points. Starts full.
 */
export interface HealthComponent {
  current: number;
  max: number;
}

/**
 * Transform - world placement and uniform scale.
 * translation.z is the drawing layer.
 */
export interface TransformComponent {
  translation: { x: number; y: number; z: number };
  scale: number;
}

/**
 * Team - caller-supplied affiliation, never part of per-type data.
 */
export interface TeamComponent {
  team: Team;
}

/**
 * CurrentAnimation - which animation child should be showing.
 */
export interface CurrentAnimationComponent {
  kind: AnimationKind;
}

// ============================================
// Behavior Components
// ============================================

/**
 * Behaviors - the repertoire holder.
 * supported mirrors the presence markers one-to-one.
 */
export interface BehaviorsComponent {
  current: BehaviorKind;
  supported: BehaviorEntry[];
}

// Note: behavior markers have no data - their presence on an entity
// tells the AI loop that the behavior is legal for it.

export interface IdleBehaviorComponent {}
export interface WanderBehaviorComponent {}
export interface MoveToOriginBehaviorComponent {}
export interface ChaseBehaviorComponent {}
export interface FleeBehaviorComponent {}
export interface AttackBehaviorComponent {}
export interface DeadBehaviorComponent {}

// ============================================
// Visual Children
// ============================================

/**
 * AnimatedSprite - one sprite-sheet clip owned by a unit.
 * The playback engine advances frame; only one child per unit is visible.
 */
export interface AnimatedSpriteComponent {
  clip: AnimationClipSpec;
  frame: number;
  visible: boolean;
}

// ============================================
// Support Abilities
// ============================================

/**
 * ManaGenerator - adds amount to the owning team's pool every cooldownSeconds.
 */
export interface ManaGeneratorComponent {
  amount: number;
  cooldownSeconds: number;
  elapsed: number; // Seconds accumulated toward the next payout
}

// ============================================
// Resources
// ============================================

export interface ManaPool {
  current: number;
  max: number;
}

// One pool per team, stored under Resources.ManaPools
export type ManaPoolsResource = Record<Team, ManaPool>;
