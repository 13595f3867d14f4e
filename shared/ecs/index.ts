// ============================================
// ECS Package Exports
// ============================================

// Core ECS classes
export { World } from './World';
export { ComponentStore } from './Component';

// Types and constants
export { Components, BehaviorMarkers, Tags, Resources } from './types';
export type { EntityId, ComponentType } from './types';

// Component interfaces
export type {
  // Unit base bundle
  UnitComponent,
  MovementComponent,
  VelocityComponent,
  HealthComponent,
  TransformComponent,
  TeamComponent,
  CurrentAnimationComponent,
  // Behaviors
  BehaviorsComponent,
  IdleBehaviorComponent,
  WanderBehaviorComponent,
  MoveToOriginBehaviorComponent,
  ChaseBehaviorComponent,
  FleeBehaviorComponent,
  AttackBehaviorComponent,
  DeadBehaviorComponent,
  // Visual children
  AnimatedSpriteComponent,
  // Support abilities
  ManaGeneratorComponent,
  // Resources
  ManaPool,
  ManaPoolsResource,
} from './components';
