// ============================================
// Acolyte - player support unit
// Slow and fragile; feeds the team's mana pool, flees instead of fighting
// ============================================

import { UnitType } from '#shared';
import type { UnitComposition } from './types';
import { clip } from './clips';

export const acolyte: UnitComposition = {
  unitType: UnitType.ACOLYTE,

  statProfile() {
    return { movementSpeed: 75, maxHealth: 50, visualScale: 0.8 };
  },

  behaviorRepertoire() {
    return {
      initialBehavior: 'idle',
      entries: [
        { kind: 'idle', priorityWeight: 5 },
        { kind: 'flee', priorityWeight: 10 },
        { kind: 'dead', priorityWeight: 15 },
      ],
    };
  },

  // No walk sheet exists yet, so walking reuses the idle frames
  animationClips() {
    return [
      clip('acolyte/acolyte_idle.png', [80, 80], [3, 4], 9, 'idle'),
      clip('acolyte/acolyte_idle.png', [80, 80], [3, 4], 9, 'walk'),
      clip('acolyte/acolyte_death.png', [80, 80], [3, 4], 9, 'death', { loops: false }),
    ];
  },

  manaGeneration() {
    return { amount: 5, cooldownSeconds: 1.0 };
  },
};
