// ============================================
// Shared Types & Constants
// Used by the server and any future client
// ============================================

// ECS Module - entity store, component types, component shapes
export * from './ecs';

// Game constants (GAME_CONFIG)
export * from './constants';

// Type definitions (UnitType, Team, BehaviorKind, ...)
export * from './types';
