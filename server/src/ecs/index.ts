// ============================================
// ECS - Entity Component System
// ============================================

// Core types, classes, and components from shared package
export {
  World,
  ComponentStore,
  Components,
  BehaviorMarkers,
  Tags,
  Resources,
} from '#shared';
export type {
  EntityId,
  ComponentType,
  UnitComponent,
  MovementComponent,
  VelocityComponent,
  HealthComponent,
  TransformComponent,
  TeamComponent,
  CurrentAnimationComponent,
  BehaviorsComponent,
  AnimatedSpriteComponent,
  ManaGeneratorComponent,
  ManaPoolsResource,
} from '#shared';

// Factories and World Setup
export {
  createWorld,
  spawnUnit,
  DEFAULT_SPAWN_CONTEXT,
  destroyEntity,
  teardownLevel,
  // Query helpers
  forEachUnit,
  hasBehavior,
  getUnitSnapshot,
  // Required accessors
  requireMovement,
  requireVelocity,
  requireHealth,
  requireTransform,
  requireTeam,
  requireBehaviors,
  requireAnimatedSprite,
  requireManaPools,
} from './factories';
export type { SpawnContext, UnitSnapshot } from './factories';

// Animation children
export { spawnAnimatedChildren, spriteAnimationInstantiator } from './animation';
export type { AnimationInstantiator } from './animation';

// Systems
export * from './systems';
