// ============================================
// Shared Types & Interfaces
// Unit vocabulary, teams, behaviors, animation kinds
// ============================================

// World-space position
// z is the drawing layer; omitted means ground layer
export interface Position {
  x: number;
  y: number;
  z?: number;
}

// Velocity vector (units per second)
export interface Velocity {
  x: number;
  y: number;
}

// Spawnable unit categories
export enum UnitType {
  ACOLYTE = 'acolyte',
  WARRIOR = 'warrior',
  CAT = 'cat',
  KNIGHT = 'knight',
}

/**
 * Every declared unit type, in declaration order.
 * Used by startup validation to prove each type is fully configured.
 */
export const ALL_UNIT_TYPES: readonly UnitType[] = Object.values(UnitType);

// Team affiliation - always supplied by whoever spawns the unit
export type Team = 'player' | 'enemy';

// AI behavior tags
// The decision loop that switches between them lives outside this repo
export type BehaviorKind =
  | 'idle'
  | 'wander'
  | 'moveToOrigin'
  | 'chase'
  | 'flee'
  | 'attack'
  | 'dead';

// Sprite animation categories
export type AnimationKind = 'idle' | 'walk' | 'death' | 'attack';

// ============================================
// Unit Descriptors
// Static per-type data produced by unit compositions
// ============================================

/**
 * Base stats for a unit type. Fresh object per request;
 * the spawned entity owns the copy it was built from.
 */
export interface StatProfile {
  movementSpeed: number; // Units per second
  maxHealth: number;     // Whole hit points
  visualScale: number;   // Uniform sprite scale
}

/**
 * One sprite-sheet clip. A unit spawns one animation child per clip.
 * frameCount never exceeds grid.columns * grid.rows.
 */
export interface AnimationClipSpec {
  spriteSheet: string; // Asset path relative to the asset root
  frameSize: { width: number; height: number };
  grid: { columns: number; rows: number };
  frameCount: number;
  kind: AnimationKind;
  loops: boolean;
  attackTriggered: boolean; // Played when an attack lands rather than on a state change
}

export interface BehaviorEntry {
  kind: BehaviorKind;
  priorityWeight: number;
}

/**
 * The behaviors legal for a unit, with priority weights, plus the one it starts in.
 * Tie-breaking between equal weights is up to the AI loop.
 */
export interface BehaviorRepertoire {
  initialBehavior: BehaviorKind;
  entries: BehaviorEntry[];
}

// Passive mana income granted by support units
export interface ManaGeneration {
  amount: number;
  cooldownSeconds: number;
}
