// ============================================
// Unit Composition Types
// ============================================

import type {
  AnimationClipSpec,
  BehaviorRepertoire,
  ManaGeneration,
  StatProfile,
  UnitType,
} from '#shared';

/**
 * UnitComposition - everything static about one unit type.
 *
 * Every query is pure and takes no input: repeated calls return
 * value-equal fresh objects, so callers may cache or mutate the result.
 * Each unit type implements this on its own; there is no base class.
 */
export interface UnitComposition {
  readonly unitType: UnitType;

  statProfile(): StatProfile;
  behaviorRepertoire(): BehaviorRepertoire;
  animationClips(): AnimationClipSpec[];

  /** Support units that feed their team's mana pool. */
  manaGeneration?(): ManaGeneration;
}

/**
 * Unit type -> composition. Exhaustive by construction.
 */
export type UnitCatalog = Readonly<Record<UnitType, UnitComposition>>;

/**
 * A composition's queries evaluated once and validated.
 * This is what the spawn path consumes.
 */
export interface ResolvedUnitComposition {
  unitType: UnitType;
  stats: StatProfile;
  repertoire: BehaviorRepertoire;
  clips: AnimationClipSpec[];
  manaGeneration: ManaGeneration | null;
}
