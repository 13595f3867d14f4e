// ============================================
// Knight - armored enemy attacker
// Marches on the origin, wanders when idle, escalates to chase and attack
// ============================================

import { UnitType } from '#shared';
import type { UnitComposition } from './types';
import { clip } from './clips';

export const knight: UnitComposition = {
  unitType: UnitType.KNIGHT,

  statProfile() {
    return { movementSpeed: 250, maxHealth: 90, visualScale: 1.5 };
  },

  // Weights rise with escalation: wander < moveToOrigin < chase < attack < dead
  behaviorRepertoire() {
    return {
      initialBehavior: 'moveToOrigin',
      entries: [
        { kind: 'wander', priorityWeight: 3 },
        { kind: 'moveToOrigin', priorityWeight: 5 },
        { kind: 'chase', priorityWeight: 10 },
        { kind: 'attack', priorityWeight: 15 },
        { kind: 'dead', priorityWeight: 20 },
      ],
    };
  },

  animationClips() {
    return [
      clip('enemy/enemy_idle.png', [64, 64], [12, 1], 11, 'idle'),
      clip('enemy/enemy_move.png', [96, 64], [8, 1], 7, 'walk'),
      clip('enemy/enemy_death.png', [96, 64], [15, 1], 14, 'death', { loops: false }),
      clip('enemy/enemy_attack.png', [144, 64], [22, 1], 21, 'attack', {
        loops: false,
        attackTriggered: true,
      }),
    ];
  },
};
