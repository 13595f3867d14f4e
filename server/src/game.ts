// ============================================
// Game Setup
// Validates static unit data, then builds the world and system runner
// ============================================

import type { World } from '#shared';
import {
  createWorld,
  spriteAnimationInstantiator,
  SystemRunner,
  SystemPriority,
  ManaSystem,
  type SpawnContext,
} from './ecs';
import { UNIT_CATALOG, createUnitRegistry, validateUnitCatalog, type UnitCatalog, type UnitTypeRegistry } from './units';
import { logCatalogValidated } from './logger';

export interface Game {
  world: World;
  registry: UnitTypeRegistry;
  runner: SystemRunner;
  // The validated catalog; pass this to every spawn and summon
  spawnContext: SpawnContext;
}

/**
 * Build a ready-to-tick game.
 * Throws a UnitConfigurationDefect error before creating anything if any
 * unit type is misconfigured or missing from the registry.
 */
export function createGame(catalog: UnitCatalog = UNIT_CATALOG): Game {
  const resolved = validateUnitCatalog(catalog);
  const registry = createUnitRegistry();
  logCatalogValidated(resolved.map((unit) => unit.unitType));

  const world = createWorld();
  const runner = new SystemRunner();
  runner.register(new ManaSystem(), SystemPriority.MANA);

  return {
    world,
    registry,
    runner,
    spawnContext: { catalog, animator: spriteAnimationInstantiator },
  };
}
