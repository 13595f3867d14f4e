// ============================================
// Unit Spawning Tests
// spawnUnit assembly, atomicity, teardown
// ============================================

import { describe, it, expect, beforeEach } from 'vitest';
import { Components, GAME_CONFIG, Tags, UnitType, type World } from '#shared';
import type { AnimatedSpriteComponent, ManaGeneratorComponent } from '#shared';
import {
  spawnUnit,
  teardownLevel,
  destroyEntity,
  forEachUnit,
  hasBehavior,
  getUnitSnapshot,
  requireMovement,
  requireVelocity,
  requireHealth,
  requireTransform,
  requireTeam,
  requireBehaviors,
  requireAnimatedSprite,
} from '../factories';
import { UNIT_CATALOG } from '../../units';
import {
  createTestWorld,
  spawnTestUnit,
  contextWith,
  createMockAnimator,
} from '../systems/__tests__/testUtils';

const BEHAVIOR_MARKER_TYPES = [
  Components.IdleBehavior,
  Components.WanderBehavior,
  Components.MoveToOriginBehavior,
  Components.ChaseBehavior,
  Components.FleeBehavior,
  Components.AttackBehavior,
  Components.DeadBehavior,
];

function markersOn(world: World, entity: number): string[] {
  return BEHAVIOR_MARKER_TYPES.filter((type) => world.hasComponent(entity, type));
}

describe('spawnUnit', () => {
  let world: World;

  beforeEach(() => {
    world = createTestWorld();
  });

  describe('support unit', () => {
    it('spawns a player acolyte with its stats, team and position', () => {
      const entity = spawnUnit(world, UnitType.ACOLYTE, 'player', { x: 100, y: 50 });

      expect(requireMovement(world, entity).speed).toBe(75);
      expect(requireHealth(world, entity)).toEqual({ current: 50, max: 50 });
      expect(requireTeam(world, entity).team).toBe('player');
      expect(requireTransform(world, entity)).toEqual({
        translation: { x: 100, y: 50, z: GAME_CONFIG.UNIT_Z_LAYER },
        scale: 0.8,
      });
      expect(requireVelocity(world, entity)).toEqual({ x: 0, y: 0 });
    });

    it('starts idle with idle, flee and dead markers only', () => {
      const entity = spawnUnit(world, UnitType.ACOLYTE, 'player', { x: 100, y: 50 });

      expect(requireBehaviors(world, entity).current).toBe('idle');
      expect(markersOn(world, entity)).toEqual([
        Components.IdleBehavior,
        Components.FleeBehavior,
        Components.DeadBehavior,
      ]);
    });

    it('owns one animation child per clip: idle, walk, death', () => {
      const entity = spawnUnit(world, UnitType.ACOLYTE, 'player', { x: 100, y: 50 });
      const children = world.getChildren(entity);

      expect(children).toHaveLength(3);
      expect(children.map((child) => requireAnimatedSprite(world, child).clip.kind)).toEqual([
        'idle',
        'walk',
        'death',
      ]);
      for (const child of children) {
        expect(world.getParent(child)).toBe(entity);
        expect(world.hasTag(child, Tags.AnimationChild)).toBe(true);
      }
    });

    it('shows only the idle child at spawn', () => {
      const entity = spawnTestUnit(world);
      const visible = world
        .getChildren(entity)
        .filter((child) => requireAnimatedSprite(world, child).visible)
        .map((child) => requireAnimatedSprite(world, child).clip.kind);

      expect(visible).toEqual(['idle']);
    });

    it('carries a fresh mana generator', () => {
      const entity = spawnTestUnit(world);

      expect(world.getComponent<ManaGeneratorComponent>(entity, Components.ManaGenerator)).toEqual({
        amount: 5,
        cooldownSeconds: 1,
        elapsed: 0,
      });
    });
  });

  describe('frontline unit', () => {
    it('starts moving to the origin with the full five-behavior ladder', () => {
      const entity = spawnUnit(world, UnitType.KNIGHT, 'enemy', { x: 100, y: 50 });
      const behaviors = requireBehaviors(world, entity);

      expect(requireMovement(world, entity).speed).toBe(250);
      expect(requireHealth(world, entity).max).toBe(90);
      expect(behaviors.current).toBe('moveToOrigin');
      expect(behaviors.supported).toEqual([
        { kind: 'wander', priorityWeight: 3 },
        { kind: 'moveToOrigin', priorityWeight: 5 },
        { kind: 'chase', priorityWeight: 10 },
        { kind: 'attack', priorityWeight: 15 },
        { kind: 'dead', priorityWeight: 20 },
      ]);
      expect(markersOn(world, entity)).toEqual([
        Components.WanderBehavior,
        Components.MoveToOriginBehavior,
        Components.ChaseBehavior,
        Components.AttackBehavior,
        Components.DeadBehavior,
      ]);
      expect(world.getChildren(entity)).toHaveLength(4);
    });

    it('has no mana generator', () => {
      const entity = spawnTestUnit(world, { unitType: UnitType.KNIGHT, team: 'enemy' });
      expect(world.hasComponent(entity, Components.ManaGenerator)).toBe(false);
    });
  });

  describe.each([UnitType.ACOLYTE, UnitType.WARRIOR, UnitType.CAT, UnitType.KNIGHT])('%s', (unitType) => {
    it('matches its composition exactly', () => {
      const composition = UNIT_CATALOG[unitType];
      const stats = composition.statProfile();
      const repertoire = composition.behaviorRepertoire();
      const entity = spawnTestUnit(world, { unitType, team: 'enemy', x: -20, y: 7.5 });

      expect(requireMovement(world, entity).speed).toBe(stats.movementSpeed);
      expect(requireHealth(world, entity).max).toBe(stats.maxHealth);
      expect(requireTransform(world, entity).scale).toBe(stats.visualScale);
      expect(requireTransform(world, entity).translation).toEqual({ x: -20, y: 7.5, z: 0 });
      expect(requireBehaviors(world, entity).current).toBe(repertoire.initialBehavior);
      expect(markersOn(world, entity)).toHaveLength(repertoire.entries.length);
      for (const entry of repertoire.entries) {
        expect(hasBehavior(world, entity, entry.kind)).toBe(true);
      }
      expect(world.getChildren(entity)).toHaveLength(composition.animationClips().length);
    });
  });

  it('uses the caller-supplied team, whatever the unit type', () => {
    const knight = spawnTestUnit(world, { unitType: UnitType.KNIGHT, team: 'player' });
    const cat = spawnTestUnit(world, { unitType: UnitType.CAT, team: 'enemy' });

    expect(requireTeam(world, knight).team).toBe('player');
    expect(requireTeam(world, cat).team).toBe('enemy');
  });

  it('tags units for teardown and identifies their type', () => {
    const entity = spawnTestUnit(world, { unitType: UnitType.WARRIOR });

    expect(world.hasTag(entity, Tags.Unit)).toBe(true);
    expect(world.hasTag(entity, Tags.Cleanup)).toBe(true);
    expect(world.getComponent(entity, Components.Unit)).toEqual({ unitType: UnitType.WARRIOR });
    expect(world.getComponent(entity, Components.CurrentAnimation)).toEqual({ kind: 'idle' });
  });

  it('gives each spawn its own component data', () => {
    const first = spawnTestUnit(world, { unitType: UnitType.KNIGHT });
    requireBehaviors(world, first).supported.pop();
    requireAnimatedSprite(world, world.getChildren(first)[0]).clip.grid.columns = 1;

    const second = spawnTestUnit(world, { unitType: UnitType.KNIGHT });

    expect(requireBehaviors(world, second).supported).toHaveLength(5);
    expect(requireAnimatedSprite(world, world.getChildren(second)[0]).clip.grid.columns).toBe(12);
  });

  it('hands the composition clips to the animation collaborator once', () => {
    const animator = createMockAnimator();
    const entity = spawnTestUnit(world, {
      unitType: UnitType.CAT,
      context: { catalog: UNIT_CATALOG, animator },
    });

    expect(animator.calls).toHaveLength(1);
    expect(animator.calls[0].parent).toBe(entity);
    expect(animator.calls[0].clips).toEqual(UNIT_CATALOG[UnitType.CAT].animationClips());
  });

  describe('atomicity', () => {
    it('creates nothing when the repertoire is malformed', () => {
      const context = contextWith(UnitType.KNIGHT, {
        behaviorRepertoire: () => ({
          initialBehavior: 'flee',
          entries: [{ kind: 'chase', priorityWeight: 1 }],
        }),
      });

      expect(() => spawnTestUnit(world, { unitType: UnitType.KNIGHT, context })).toThrow(
        'UnitConfigurationDefect: knight: initial behavior "flee" is not in the repertoire'
      );
      expect(world.entityCount).toBe(0);
    });

    it('creates nothing when a clip overflows its grid', () => {
      const context = contextWith(UnitType.WARRIOR, {
        animationClips: () => [
          {
            spriteSheet: 'warrior/warrior_idle.png',
            frameSize: { width: 96, height: 96 },
            grid: { columns: 20, rows: 1 },
            frameCount: 21,
            kind: 'idle',
            loops: true,
            attackTriggered: false,
          },
        ],
      });

      expect(() => spawnTestUnit(world, { unitType: UnitType.WARRIOR, context })).toThrow(
        'UnitConfigurationDefect: warrior:'
      );
      expect(world.entityCount).toBe(0);
    });

    it('rolls back the unit and its children when the animation collaborator fails', () => {
      const survivor = spawnTestUnit(world);
      const before = world.entityCount;
      const animator = createMockAnimator({ failAfter: 2 });

      expect(() =>
        spawnTestUnit(world, {
          unitType: UnitType.KNIGHT,
          context: { catalog: UNIT_CATALOG, animator },
        })
      ).toThrow('sprite sheet failed to load');

      expect(world.entityCount).toBe(before);
      expect(world.getEntitiesWithTag(Tags.Unit)).toEqual([survivor]);
      expect(world.query(Components.Behaviors)).toEqual([survivor]);
    });

    it('keeps entities it did not create when a failing animator adopted them', () => {
      const scenery = world.createEntity();
      const animator = {
        instantiateChildren(target: World, parent: number): number[] {
          target.setParent(scenery, parent);
          throw new Error('sprite sheet failed to load');
        },
      };

      expect(() =>
        spawnTestUnit(world, { unitType: UnitType.CAT, context: { catalog: UNIT_CATALOG, animator } })
      ).toThrow('sprite sheet failed to load');

      expect(world.getAllEntities()).toEqual([scenery]);
      expect(world.getParent(scenery)).toBeUndefined();
    });

    it('rejects a non-finite position before creating anything', () => {
      expect(() => spawnUnit(world, UnitType.CAT, 'player', { x: Number.NaN, y: 0 })).toThrow(
        'InvalidSpawnPosition: (NaN, 0) for cat'
      );
      expect(world.entityCount).toBe(0);
    });
  });
});

describe('destruction and teardown', () => {
  let world: World;

  beforeEach(() => {
    world = createTestWorld();
  });

  it('destroys a unit with its animation children', () => {
    const entity = spawnTestUnit(world, { unitType: UnitType.KNIGHT });
    const children = world.getChildren(entity);

    destroyEntity(world, entity);

    expect(world.hasEntity(entity)).toBe(false);
    for (const child of children) {
      expect(world.hasEntity(child)).toBe(false);
      expect(world.getComponent<AnimatedSpriteComponent>(child, Components.AnimatedSprite)).toBeUndefined();
    }
    expect(world.entityCount).toBe(0);
  });

  it('tears down every tagged unit and leaves other entities alone', () => {
    spawnTestUnit(world, { unitType: UnitType.ACOLYTE });
    spawnTestUnit(world, { unitType: UnitType.KNIGHT, team: 'enemy' });
    const scenery = world.createEntity();

    expect(world.entityCount).toBe(1 + 3 + 1 + 4 + 1);
    expect(teardownLevel(world)).toBe(2);
    expect(world.getAllEntities()).toEqual([scenery]);
  });
});

describe('query helpers', () => {
  let world: World;

  beforeEach(() => {
    world = createTestWorld();
  });

  it('iterates units with their type and team', () => {
    const acolyte = spawnTestUnit(world);
    const knight = spawnTestUnit(world, { unitType: UnitType.KNIGHT, team: 'enemy' });
    const seen: Array<[number, UnitType, string]> = [];

    forEachUnit(world, (entity, unitType, team) => seen.push([entity, unitType, team]));

    expect(seen).toEqual([
      [acolyte, UnitType.ACOLYTE, 'player'],
      [knight, UnitType.KNIGHT, 'enemy'],
    ]);
  });

  it('answers behavior legality from marker presence', () => {
    const acolyte = spawnTestUnit(world);

    expect(hasBehavior(world, acolyte, 'flee')).toBe(true);
    expect(hasBehavior(world, acolyte, 'attack')).toBe(false);
  });

  it('builds a snapshot of a unit', () => {
    const entity = spawnUnit(world, UnitType.CAT, 'enemy', { x: 3, y: 4 });

    expect(getUnitSnapshot(world, entity)).toEqual({
      entity,
      unitType: UnitType.CAT,
      team: 'enemy',
      position: { x: 3, y: 4, z: 0 },
      health: 125,
      maxHealth: 125,
      behavior: 'idle',
      animationChildren: 4,
    });
  });

  it('returns null for an entity that is not a unit', () => {
    expect(getUnitSnapshot(world, world.createEntity())).toBeNull();
  });

  it('throws a tagged error when a required component is missing', () => {
    const bare = world.createEntity();
    expect(() => requireHealth(world, bare)).toThrow(`EntityMissingComponent: Health missing on entity ${bare}`);
  });
});
