// ============================================
// ECS Entity Factories
// World setup, unit spawning, teardown and component accessors
// ============================================

import {
  GAME_CONFIG,
  World,
  ComponentStore,
  Components,
  BehaviorMarkers,
  Tags,
  Resources,
} from '#shared';
import type {
  Position,
  Team,
  UnitType,
  BehaviorKind,
  EntityId,
  UnitComponent,
  MovementComponent,
  VelocityComponent,
  HealthComponent,
  TransformComponent,
  TeamComponent,
  CurrentAnimationComponent,
  BehaviorsComponent,
  IdleBehaviorComponent,
  WanderBehaviorComponent,
  MoveToOriginBehaviorComponent,
  ChaseBehaviorComponent,
  FleeBehaviorComponent,
  AttackBehaviorComponent,
  DeadBehaviorComponent,
  AnimatedSpriteComponent,
  ManaGeneratorComponent,
  ManaPoolsResource,
  StatProfile,
} from '#shared';
import { UNIT_CATALOG, resolveUnitComposition, type UnitCatalog } from '../units';
import { spriteAnimationInstantiator, type AnimationInstantiator } from './animation';
import { logUnitSpawned, logLevelTeardown } from '../logger';

// ============================================
// World Setup
// ============================================

/**
 * Create and configure an ECS World with all component stores registered
 * and both teams' mana pools seeded.
 */
export function createWorld(): World {
  const world = new World();

  // Unit base bundle
  world.registerStore(new ComponentStore<UnitComponent>(Components.Unit));
  world.registerStore(new ComponentStore<MovementComponent>(Components.Movement));
  world.registerStore(new ComponentStore<VelocityComponent>(Components.Velocity));
  world.registerStore(new ComponentStore<HealthComponent>(Components.Health));
  world.registerStore(new ComponentStore<TransformComponent>(Components.Transform));
  world.registerStore(new ComponentStore<TeamComponent>(Components.Team));
  world.registerStore(new ComponentStore<CurrentAnimationComponent>(Components.CurrentAnimation));

  // Behavior holder + markers (no data, just presence)
  world.registerStore(new ComponentStore<BehaviorsComponent>(Components.Behaviors));
  world.registerStore(new ComponentStore<IdleBehaviorComponent>(Components.IdleBehavior));
  world.registerStore(new ComponentStore<WanderBehaviorComponent>(Components.WanderBehavior));
  world.registerStore(new ComponentStore<MoveToOriginBehaviorComponent>(Components.MoveToOriginBehavior));
  world.registerStore(new ComponentStore<ChaseBehaviorComponent>(Components.ChaseBehavior));
  world.registerStore(new ComponentStore<FleeBehaviorComponent>(Components.FleeBehavior));
  world.registerStore(new ComponentStore<AttackBehaviorComponent>(Components.AttackBehavior));
  world.registerStore(new ComponentStore<DeadBehaviorComponent>(Components.DeadBehavior));

  // Visual children
  world.registerStore(new ComponentStore<AnimatedSpriteComponent>(Components.AnimatedSprite));

  // Support abilities
  world.registerStore(new ComponentStore<ManaGeneratorComponent>(Components.ManaGenerator));

  world.setResource<ManaPoolsResource>(Resources.ManaPools, {
    player: { current: GAME_CONFIG.STARTING_MANA, max: GAME_CONFIG.MAX_MANA },
    enemy: { current: GAME_CONFIG.STARTING_MANA, max: GAME_CONFIG.MAX_MANA },
  });

  return world;
}

// ============================================
// Unit Spawning
// ============================================

/**
 * What the spawn path reads: the unit catalog and the animation collaborator.
 */
export interface SpawnContext {
  catalog: UnitCatalog;
  animator: AnimationInstantiator;
}

export const DEFAULT_SPAWN_CONTEXT: SpawnContext = {
  catalog: UNIT_CATALOG,
  animator: spriteAnimationInstantiator,
};

/**
 * Base components every unit carries, before team affiliation is applied.
 */
interface UnitBundle {
  unit: UnitComponent;
  movement: MovementComponent;
  velocity: VelocityComponent;
  health: HealthComponent;
  transform: TransformComponent;
  currentAnimation: CurrentAnimationComponent;
}

function createUnitBundle(unitType: UnitType, stats: StatProfile, position: Position): UnitBundle {
  return {
    unit: { unitType },
    movement: { speed: stats.movementSpeed },
    velocity: { x: 0, y: 0 },
    health: { current: stats.maxHealth, max: stats.maxHealth },
    transform: {
      translation: { x: position.x, y: position.y, z: GAME_CONFIG.UNIT_Z_LAYER },
      scale: stats.visualScale,
    },
    currentAnimation: { kind: 'idle' },
  };
}

/**
 * Spawn a fully composed unit.
 *
 * All static data is resolved and validated before the world is touched,
 * so a configuration defect leaves nothing behind. Assembly then runs in a
 * world transaction: base bundle, team, tags, behavior holder, one marker
 * per legal behavior, mana generator, animation children.
 * If the animation collaborator throws, the unit and any children it made
 * are destroyed before the error propagates.
 */
export function spawnUnit(
  world: World,
  unitType: UnitType,
  team: Team,
  position: Position,
  context: SpawnContext = DEFAULT_SPAWN_CONTEXT
): EntityId {
  if (!Number.isFinite(position.x) || !Number.isFinite(position.y)) {
    throw new Error(`InvalidSpawnPosition: (${position.x}, ${position.y}) for ${unitType}`);
  }

  const resolved = resolveUnitComposition(context.catalog[unitType]);
  const bundle = createUnitBundle(unitType, resolved.stats, position);
  const { repertoire } = resolved;

  const entity = world.transaction(() => {
    const entity = world.createEntity();

    world.addComponent<UnitComponent>(entity, Components.Unit, bundle.unit);
    world.addComponent<MovementComponent>(entity, Components.Movement, bundle.movement);
    world.addComponent<VelocityComponent>(entity, Components.Velocity, bundle.velocity);
    world.addComponent<HealthComponent>(entity, Components.Health, bundle.health);
    world.addComponent<TransformComponent>(entity, Components.Transform, bundle.transform);
    world.addComponent<CurrentAnimationComponent>(entity, Components.CurrentAnimation, bundle.currentAnimation);

    // Team is caller-supplied, applied over the per-type bundle
    world.addComponent<TeamComponent>(entity, Components.Team, { team });

    world.addTag(entity, Tags.Unit);
    world.addTag(entity, Tags.Cleanup);

    world.addComponent<BehaviorsComponent>(entity, Components.Behaviors, {
      current: repertoire.initialBehavior,
      supported: repertoire.entries.map((entry) => ({ ...entry })),
    });
    for (const entry of repertoire.entries) {
      world.addComponent(entity, BehaviorMarkers[entry.kind], {});
    }

    if (resolved.manaGeneration) {
      world.addComponent<ManaGeneratorComponent>(entity, Components.ManaGenerator, {
        amount: resolved.manaGeneration.amount,
        cooldownSeconds: resolved.manaGeneration.cooldownSeconds,
        elapsed: 0,
      });
    }

    context.animator.instantiateChildren(world, entity, resolved.clips);

    return entity;
  });

  logUnitSpawned(entity, unitType, team, position, world.getChildren(entity).length);
  return entity;
}

// ============================================
// Destruction & Teardown
// ============================================

/**
 * Destroy a unit together with its animation children.
 */
export function destroyEntity(world: World, entity: EntityId): void {
  world.destroyEntity(entity);
}

/**
 * End-of-level teardown: destroy every entity carrying the cleanup tag
 * (and, by ownership, everything they own). Returns how many tagged
 * entities were destroyed.
 */
export function teardownLevel(world: World): number {
  const doomed = world.getEntitiesWithTag(Tags.Cleanup);
  for (const entity of doomed) {
    world.destroyEntity(entity);
  }
  logLevelTeardown(doomed.length);
  return doomed.length;
}

// ============================================
// Query Helpers
// ============================================

/**
 * Iterate over all spawned units with their type and team.
 */
export function forEachUnit(
  world: World,
  callback: (entity: EntityId, unitType: UnitType, team: Team) => void
): void {
  for (const entity of world.getEntitiesWithTag(Tags.Unit)) {
    const unit = world.getComponent<UnitComponent>(entity, Components.Unit);
    const team = world.getComponent<TeamComponent>(entity, Components.Team);
    if (!unit || !team) continue;
    callback(entity, unit.unitType, team.team);
  }
}

/**
 * Is this behavior legal for the entity? Answered by marker presence.
 */
export function hasBehavior(world: World, entity: EntityId, kind: BehaviorKind): boolean {
  return world.hasComponent(entity, BehaviorMarkers[kind]);
}

/**
 * Unit snapshot for debugging and logs.
 */
export interface UnitSnapshot {
  entity: EntityId;
  unitType: UnitType;
  team: Team;
  position: { x: number; y: number; z: number };
  health: number;
  maxHealth: number;
  behavior: BehaviorKind;
  animationChildren: number;
}

export function getUnitSnapshot(world: World, entity: EntityId): UnitSnapshot | null {
  const unit = world.getComponent<UnitComponent>(entity, Components.Unit);
  const team = world.getComponent<TeamComponent>(entity, Components.Team);
  const transform = world.getComponent<TransformComponent>(entity, Components.Transform);
  const health = world.getComponent<HealthComponent>(entity, Components.Health);
  const behaviors = world.getComponent<BehaviorsComponent>(entity, Components.Behaviors);
  if (!unit || !team || !transform || !health || !behaviors) return null;

  return {
    entity,
    unitType: unit.unitType,
    team: team.team,
    position: { ...transform.translation },
    health: health.current,
    maxHealth: health.max,
    behavior: behaviors.current,
    animationChildren: world.getChildren(entity).length,
  };
}

// ============================================
// Required Accessors
// Throw when a unit is missing a component it must have (invariant violation)
// ============================================

function requireComponent<T>(world: World, entity: EntityId, type: string): T {
  const comp = world.getComponent<T>(entity, type);
  if (!comp) {
    throw new Error(`EntityMissingComponent: ${type} missing on entity ${entity}`);
  }
  return comp;
}

export function requireMovement(world: World, entity: EntityId): MovementComponent {
  return requireComponent<MovementComponent>(world, entity, Components.Movement);
}

export function requireVelocity(world: World, entity: EntityId): VelocityComponent {
  return requireComponent<VelocityComponent>(world, entity, Components.Velocity);
}

export function requireHealth(world: World, entity: EntityId): HealthComponent {
  return requireComponent<HealthComponent>(world, entity, Components.Health);
}

export function requireTransform(world: World, entity: EntityId): TransformComponent {
  return requireComponent<TransformComponent>(world, entity, Components.Transform);
}

export function requireTeam(world: World, entity: EntityId): TeamComponent {
  return requireComponent<TeamComponent>(world, entity, Components.Team);
}

export function requireBehaviors(world: World, entity: EntityId): BehaviorsComponent {
  return requireComponent<BehaviorsComponent>(world, entity, Components.Behaviors);
}

export function requireAnimatedSprite(world: World, entity: EntityId): AnimatedSpriteComponent {
  return requireComponent<AnimatedSpriteComponent>(world, entity, Components.AnimatedSprite);
}

export function requireManaPools(world: World): ManaPoolsResource {
  const pools = world.getResource<ManaPoolsResource>(Resources.ManaPools);
  if (!pools) {
    throw new Error('WorldMissingResource: manaPools not set - create the world with createWorld()');
  }
  return pools;
}
