// ============================================
// Summoning
// Paid spawns: check the team's mana against the registry cost,
// spawn, then charge
// ============================================

import type { EntityId, Position, Team, UnitType, World } from '#shared';
import { spawnUnit, requireManaPools, DEFAULT_SPAWN_CONTEXT, type SpawnContext } from './ecs';
import type { UnitTypeRegistry } from './units';
import { logUnitSummoned, logSummonRefused } from './logger';

export type SummonResult =
  | { ok: true; entity: EntityId; cost: number }
  | { ok: false; reason: 'insufficient_mana'; cost: number; available: number };

/**
 * Summon a unit for a team if it can pay.
 *
 * The cost is only deducted after the spawn succeeds, so a configuration
 * defect thrown by spawnUnit leaves the pool untouched.
 */
export function summonUnit(
  world: World,
  registry: UnitTypeRegistry,
  unitType: UnitType,
  team: Team,
  position: Position,
  context: SpawnContext = DEFAULT_SPAWN_CONTEXT
): SummonResult {
  const { cost } = registry.lookup(unitType);
  const pool = requireManaPools(world)[team];

  if (pool.current < cost) {
    logSummonRefused(unitType, team, cost, pool.current);
    return { ok: false, reason: 'insufficient_mana', cost, available: pool.current };
  }

  const entity = spawnUnit(world, unitType, team, position, context);
  pool.current -= cost;

  logUnitSummoned(entity, unitType, team, cost, pool.current);
  return { ok: true, entity, cost };
}

/**
 * Can the team pay for this unit right now?
 */
export function canAfford(world: World, registry: UnitTypeRegistry, unitType: UnitType, team: Team): boolean {
  return requireManaPools(world)[team].current >= registry.lookup(unitType).cost;
}
