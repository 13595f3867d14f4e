// ============================================
// Units - per-type compositions and the registry
// ============================================

import { UnitType } from '#shared';
import type { UnitCatalog } from './types';
import { acolyte } from './acolyte';
import { warrior } from './warrior';
import { cat } from './cat';
import { knight } from './knight';

/**
 * The shipped unit catalog. Passed into the spawn path explicitly;
 * tests may hand in their own.
 */
export const UNIT_CATALOG: UnitCatalog = Object.freeze({
  [UnitType.ACOLYTE]: acolyte,
  [UnitType.WARRIOR]: warrior,
  [UnitType.CAT]: cat,
  [UnitType.KNIGHT]: knight,
});

export { acolyte, warrior, cat, knight };
export { clip, defaultBehaviorRepertoire } from './clips';
export {
  configurationDefect,
  resolveUnitComposition,
  validateAnimationClips,
  validateBehaviorRepertoire,
  validateUnitCatalog,
} from './validation';
export { UnitTypeRegistry, createUnitRegistry, DEFAULT_UNIT_COSTS } from './registry';
export type { UnitConfig } from './registry';
export type { UnitComposition, UnitCatalog, ResolvedUnitComposition } from './types';
