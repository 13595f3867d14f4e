// ============================================
// Warrior - heavy player brawler
// ============================================

import { UnitType } from '#shared';
import type { UnitComposition } from './types';
import { clip, defaultBehaviorRepertoire } from './clips';

export const warrior: UnitComposition = {
  unitType: UnitType.WARRIOR,

  statProfile() {
    return { movementSpeed: 200, maxHealth: 255, visualScale: 1.8 };
  },

  behaviorRepertoire() {
    return defaultBehaviorRepertoire();
  },

  animationClips() {
    return [
      clip('warrior/warrior_idle.png', [96, 96], [21, 1], 20, 'idle'),
      clip('warrior/warrior_walk.png', [96, 96], [11, 1], 10, 'walk'),
      clip('warrior/warrior_death.png', [96, 96], [36, 1], 35, 'death', { loops: false }),
      clip('warrior/warrior_attack.png', [96, 96], [33, 1], 32, 'attack', {
        loops: false,
        attackTriggered: true,
      }),
    ];
  },
};
