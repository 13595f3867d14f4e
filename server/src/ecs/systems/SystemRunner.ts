// ============================================
// ECS System Runner
// Manages and executes all game systems in priority order
// ============================================

import type { World } from '#shared';
import type { System } from './types';
import { logger, perfLogger } from '../../logger';

// Ticks slower than this get a per-system breakdown in the perf log
const SLOW_TICK_MS = 10;

/**
 * Registered system with its priority
 */
interface RegisteredSystem {
  system: System;
  priority: number;
}

/**
 * SystemRunner - Manages and executes all game systems
 *
 * Systems are executed in priority order (lower numbers first).
 * Equal priorities keep registration order. Ticks are numbered from 1 so
 * errors and slow ticks can be lined up with mana payouts in the logs.
 */
export class SystemRunner {
  private systems: RegisteredSystem[] = [];
  private tick = 0;

  /**
   * Register a system with a priority
   * @param priority Lower numbers run first
   */
  register(system: System, priority: number): void {
    this.systems.push({ system, priority });
    this.systems.sort((a, b) => a.priority - b.priority);
  }

  /**
   * Run all systems in priority order.
   * A throwing system is logged and skipped for this tick; the rest still run.
   */
  update(world: World, deltaTime: number): void {
    this.tick++;
    const tickStart = performance.now();
    const timings: { name: string; ms: number }[] = [];

    for (const { system } of this.systems) {
      const systemStart = performance.now();
      try {
        system.update(world, deltaTime);
      } catch (error) {
        logger.error({
          event: 'system_error',
          system: system.name,
          tick: this.tick,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        }, `System ${system.name} threw an error`);
      }
      timings.push({ name: system.name, ms: performance.now() - systemStart });
    }

    const totalMs = performance.now() - tickStart;

    if (totalMs > SLOW_TICK_MS) {
      const sorted = timings.filter(t => t.ms > 0.5).sort((a, b) => b.ms - a.ms);
      const breakdown = sorted.map(t => `${t.name}:${t.ms.toFixed(1)}`).join(' ');

      perfLogger.info({
        event: 'slow_tick_breakdown',
        tick: this.tick,
        totalMs: totalMs.toFixed(1),
        breakdown: sorted.map(t => ({ name: t.name, ms: parseFloat(t.ms.toFixed(2)) })),
      }, `Slow tick ${totalMs.toFixed(1)}ms: ${breakdown}`);
    }
  }

  /**
   * Number of ticks run so far
   */
  getTickCount(): number {
    return this.tick;
  }

  /**
   * Get list of registered systems (for debugging)
   */
  getSystemNames(): string[] {
    return this.systems.map(s => `${s.system.name} (priority: ${s.priority})`);
  }
}
