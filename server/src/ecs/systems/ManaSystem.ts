// ============================================
// Mana System
// Support units pay mana into their team's pool on a fixed cooldown
// ============================================

import { Components, type World } from '#shared';
import type { BehaviorsComponent, ManaGeneratorComponent, TeamComponent } from '#shared';
import type { System } from './types';
import { requireManaPools } from '../factories';

/**
 * ManaSystem - advances every ManaGenerator and credits its team.
 *
 * A generator pays once per full cooldown elapsed, so a long tick can
 * pay more than once. Pools never exceed their max. Dead units stop
 * generating but keep their accumulated time.
 */
export class ManaSystem implements System {
  readonly name = 'ManaSystem';

  update(world: World, deltaTime: number): void {
    const pools = requireManaPools(world);

    for (const entity of world.query(Components.ManaGenerator, Components.Team)) {
      const behaviors = world.getComponent<BehaviorsComponent>(entity, Components.Behaviors);
      if (behaviors?.current === 'dead') continue;

      const generator = world.getComponent<ManaGeneratorComponent>(entity, Components.ManaGenerator);
      const team = world.getComponent<TeamComponent>(entity, Components.Team);
      if (!generator || !team) continue;

      generator.elapsed += deltaTime;
      let payouts = 0;
      while (generator.elapsed >= generator.cooldownSeconds) {
        generator.elapsed -= generator.cooldownSeconds;
        payouts++;
      }
      if (payouts === 0) continue;

      const pool = pools[team.team];
      pool.current = Math.min(pool.max, pool.current + payouts * generator.amount);
    }
  }
}
