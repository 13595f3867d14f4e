// ============================================
// Unit Composition Validation
// Authoring mistakes in static unit data are configuration defects:
// they fail fast and are never clamped or defaulted.
// ============================================

import type {
  AnimationClipSpec,
  BehaviorKind,
  BehaviorRepertoire,
  StatProfile,
  UnitType,
} from '#shared';
import { ALL_UNIT_TYPES } from '#shared';
import type { ResolvedUnitComposition, UnitCatalog, UnitComposition } from './types';

/**
 * Build the error thrown for any configuration defect.
 */
export function configurationDefect(unitType: UnitType | string, reason: string): Error {
  return new Error(`UnitConfigurationDefect: ${unitType}: ${reason}`);
}

function isPositiveFinite(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

function validateStatProfile(unitType: UnitType, stats: StatProfile): void {
  if (!Number.isFinite(stats.movementSpeed) || stats.movementSpeed <= 0) {
    throw configurationDefect(unitType, `movement speed must be positive, got ${stats.movementSpeed}`);
  }
  if (!Number.isInteger(stats.maxHealth) || stats.maxHealth <= 0) {
    throw configurationDefect(unitType, `max health must be a positive integer, got ${stats.maxHealth}`);
  }
  if (!Number.isFinite(stats.visualScale) || stats.visualScale <= 0) {
    throw configurationDefect(unitType, `visual scale must be positive, got ${stats.visualScale}`);
  }
}

/**
 * Repertoire rules:
 * - at least one entry
 * - each behavior kind listed once (one marker per entry)
 * - integer weights
 * - initial behavior is one of the entries
 */
export function validateBehaviorRepertoire(unitType: UnitType, repertoire: BehaviorRepertoire): void {
  if (repertoire.entries.length === 0) {
    throw configurationDefect(unitType, 'behavior repertoire has no entries');
  }

  const seen = new Set<BehaviorKind>();
  for (const entry of repertoire.entries) {
    if (seen.has(entry.kind)) {
      throw configurationDefect(unitType, `behavior "${entry.kind}" listed more than once`);
    }
    if (!Number.isInteger(entry.priorityWeight)) {
      throw configurationDefect(
        unitType,
        `behavior "${entry.kind}" has non-integer weight ${entry.priorityWeight}`
      );
    }
    seen.add(entry.kind);
  }

  if (!seen.has(repertoire.initialBehavior)) {
    throw configurationDefect(
      unitType,
      `initial behavior "${repertoire.initialBehavior}" is not in the repertoire`
    );
  }
}

/**
 * Clip rules:
 * - every clip has 1..columns*rows frames
 * - exactly one idle clip (the fallback pose)
 */
export function validateAnimationClips(unitType: UnitType, clips: readonly AnimationClipSpec[]): void {
  for (const clip of clips) {
    const capacity = clip.grid.columns * clip.grid.rows;
    if (!Number.isInteger(clip.frameCount) || clip.frameCount < 1 || clip.frameCount > capacity) {
      throw configurationDefect(
        unitType,
        `clip ${clip.spriteSheet} (${clip.kind}) has ${clip.frameCount} frames but its ` +
          `${clip.grid.columns}x${clip.grid.rows} grid holds ${capacity}`
      );
    }
  }

  const idleClips = clips.filter((clip) => clip.kind === 'idle').length;
  if (idleClips !== 1) {
    throw configurationDefect(unitType, `expected exactly one idle clip, found ${idleClips}`);
  }
}

/**
 * Evaluate every query of a composition once and validate the results.
 * Throws a UnitConfigurationDefect error on the first problem found.
 */
export function resolveUnitComposition(composition: UnitComposition): ResolvedUnitComposition {
  const { unitType } = composition;

  const stats = composition.statProfile();
  validateStatProfile(unitType, stats);

  const repertoire = composition.behaviorRepertoire();
  validateBehaviorRepertoire(unitType, repertoire);

  const clips = composition.animationClips();
  validateAnimationClips(unitType, clips);

  const manaGeneration = composition.manaGeneration?.() ?? null;
  if (
    manaGeneration &&
    !(isPositiveFinite(manaGeneration.amount) && isPositiveFinite(manaGeneration.cooldownSeconds))
  ) {
    throw configurationDefect(unitType, 'mana generation needs a positive amount and cooldown');
  }

  return { unitType, stats, repertoire, clips, manaGeneration };
}

/**
 * Startup check: every declared unit type has a composition, filed under
 * its own type, whose data is valid.
 */
export function validateUnitCatalog(catalog: Partial<Record<UnitType, UnitComposition>>): ResolvedUnitComposition[] {
  return ALL_UNIT_TYPES.map((unitType) => {
    const composition = catalog[unitType];
    if (!composition) {
      throw configurationDefect(unitType, 'no unit composition registered');
    }
    if (composition.unitType !== unitType) {
      throw configurationDefect(unitType, `catalog entry builds ${composition.unitType}`);
    }
    return resolveUnitComposition(composition);
  });
}
