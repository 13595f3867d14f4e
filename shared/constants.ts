// ============================================
// Game Constants & Configuration
// Static values read by the spawn path and systems
// ============================================

export const GAME_CONFIG = {
  // Spawning
  UNIT_Z_LAYER: 0, // Drawing layer every spawned unit is placed on

  // Behaviors
  DEFAULT_IDLE_WEIGHT: 0, // Weight of the lone idle entry in the default repertoire

  // Simulation
  TICK_RATE: 60, // Ticks per second

  // Mana economy (per team)
  STARTING_MANA: 100,
  MAX_MANA: 500,
} as const;
