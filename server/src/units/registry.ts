// ============================================
// Unit Type Registry
// Economic configuration per unit type, read by the summon path
// ============================================

import { ALL_UNIT_TYPES, UnitType } from '#shared';
import { configurationDefect } from './validation';

export interface UnitConfig {
  readonly cost: number; // Mana, 1..255
}

const MAX_UNIT_COST = 255;

/**
 * Default purchase costs.
 */
export const DEFAULT_UNIT_COSTS: Readonly<Record<UnitType, UnitConfig>> = {
  [UnitType.ACOLYTE]: { cost: 40 },
  [UnitType.WARRIOR]: { cost: 30 },
  [UnitType.CAT]: { cost: 20 },
  [UnitType.KNIGHT]: { cost: 50 },
};

/**
 * UnitTypeRegistry - fixed mapping from unit type to UnitConfig.
 *
 * Construction rejects a table that misses any declared unit type or
 * carries an out-of-range cost. Immutable afterwards.
 */
export class UnitTypeRegistry {
  private readonly configs: ReadonlyMap<UnitType, UnitConfig>;

  constructor(table: Partial<Record<UnitType, UnitConfig>>) {
    const configs = new Map<UnitType, UnitConfig>();

    for (const unitType of ALL_UNIT_TYPES) {
      const config = table[unitType];
      if (!config) {
        throw configurationDefect(unitType, 'missing from the unit registry');
      }
      if (!Number.isInteger(config.cost) || config.cost < 1 || config.cost > MAX_UNIT_COST) {
        throw configurationDefect(unitType, `cost must be an integer in 1..${MAX_UNIT_COST}, got ${config.cost}`);
      }
      configs.set(unitType, Object.freeze({ cost: config.cost }));
    }

    this.configs = configs;
  }

  lookup(unitType: UnitType): UnitConfig {
    const config = this.configs.get(unitType);
    if (!config) {
      throw configurationDefect(unitType, 'missing from the unit registry');
    }
    return config;
  }
}

export function createUnitRegistry(
  table: Partial<Record<UnitType, UnitConfig>> = DEFAULT_UNIT_COSTS
): UnitTypeRegistry {
  return new UnitTypeRegistry(table);
}
