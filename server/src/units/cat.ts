// ============================================
// Cat - fast player skirmisher
// ============================================

import { UnitType } from '#shared';
import type { UnitComposition } from './types';
import { clip, defaultBehaviorRepertoire } from './clips';

export const cat: UnitComposition = {
  unitType: UnitType.CAT,

  statProfile() {
    return { movementSpeed: 300, maxHealth: 125, visualScale: 1.4 };
  },

  behaviorRepertoire() {
    return defaultBehaviorRepertoire();
  },

  animationClips() {
    return [
      clip('cat/cat_idle.png', [96, 96], [10, 1], 9, 'idle'),
      clip('cat/cat_walk.png', [96, 96], [8, 1], 7, 'walk'),
      clip('cat/cat_death.png', [96, 96], [18, 1], 17, 'death', { loops: false }),
      clip('cat/cat_attack.png', [96, 96], [27, 1], 26, 'attack', {
        loops: false,
        attackTriggered: true,
      }),
    ];
  },
};
