import { GAME_CONFIG, UnitType } from '#shared';
import { createGame, type Game } from './game';
import { teardownLevel } from './ecs';
import { summonUnit } from './summoning';
import { logger } from './logger';

// ============================================
// Bootstrap
// ============================================

const TICK_INTERVAL = 1000 / GAME_CONFIG.TICK_RATE;

let game: Game;
try {
  game = createGame();
} catch (error) {
  // Misconfigured unit data: refuse to start rather than run with defaults
  logger.fatal(
    {
      event: 'startup_aborted',
      error: error instanceof Error ? error.message : String(error),
    },
    'Unit configuration defect - refusing to start'
  );
  process.exit(1);
}

const { world, registry, runner, spawnContext } = game;

// Opening position: the player starts with one acolyte at the origin,
// the enemy sends a knight from the right
summonUnit(world, registry, UnitType.ACOLYTE, 'player', { x: 0, y: 0 }, spawnContext);
summonUnit(world, registry, UnitType.KNIGHT, 'enemy', { x: 800, y: 0 }, spawnContext);

// ============================================
// Game Loop
// ============================================

const tickTimer = setInterval(() => {
  runner.update(world, TICK_INTERVAL / 1000);
}, TICK_INTERVAL);

logger.info(
  { event: 'game_started', tickRate: GAME_CONFIG.TICK_RATE, systems: runner.getSystemNames() },
  `Arena running at ${GAME_CONFIG.TICK_RATE} ticks/s`
);

// ============================================
// Graceful Shutdown
// ============================================

/**
 * Handle graceful shutdown on SIGINT (Ctrl-C) or SIGTERM.
 * Stops the tick loop and tears the level down before exiting.
 */
function shutdown(signal: string) {
  logger.info({ event: 'shutdown_initiated', signal }, `Received ${signal}, shutting down...`);
  clearInterval(tickTimer);

  const units = teardownLevel(world);

  logger.info(
    { event: 'shutdown_complete', units, ticks: runner.getTickCount() },
    'Arena shut down cleanly'
  );
  process.exit(0);
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
