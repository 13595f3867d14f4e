import pino from 'pino';
import type { Team, UnitType } from '#shared';

// ============================================
// Logger Configuration
// ============================================

const LOG_DIR = process.env.LOG_DIR || 'logs';
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const IS_DEV = process.env.NODE_ENV !== 'production';

/**
 * Create a logger with console + rotating file output
 * pino-roll is used as a Pino transport for file rotation
 * @param filename - Log file name (e.g., 'game.log')
 * @param component - Component name for filtering (e.g., 'game', 'perf')
 */
function createLogger(filename: string, component: string) {
  const targets: pino.TransportTargetOptions[] = [];

  // Console stream with pretty printing (development only)
  if (IS_DEV) {
    targets.push({
      level: LOG_LEVEL,
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    });
  }

  // Rotating file stream with JSON (always enabled)
  targets.push({
    level: 'info',
    target: 'pino-roll',
    options: {
      file: `${LOG_DIR}/${filename}`,
      size: '10m',
      limit: { count: 5 },
      mkdir: true,
    },
  });

  return pino(
    {
      level: LOG_LEVEL,
      base: { component },
    },
    pino.transport({ targets })
  );
}

// ============================================
// Logger Instances
// ============================================

// Game events (spawns, summons, teardown, startup)
export const logger = createLogger('game.log', 'game');

// Tick timing
export const perfLogger = createLogger('performance.log', 'perf');

// ============================================
// Convenience Methods for Game Events
// ============================================

/**
 * Log a unit spawn (debug - spawns are frequent)
 */
export function logUnitSpawned(
  entity: number,
  unitType: UnitType,
  team: Team,
  position: { x: number; y: number },
  children: number
) {
  logger.debug(
    { entity, unitType, team, position, children, event: 'unit_spawned' },
    `Spawned ${team} ${unitType} at (${position.x.toFixed(0)}, ${position.y.toFixed(0)})`
  );
}

/**
 * Log a paid summon
 */
export function logUnitSummoned(entity: number, unitType: UnitType, team: Team, cost: number, remaining: number) {
  logger.info(
    { entity, unitType, team, cost, remaining, event: 'unit_summoned' },
    `${team} summoned ${unitType} for ${cost} mana (${remaining} left)`
  );
}

/**
 * Log a summon refused for lack of mana
 */
export function logSummonRefused(unitType: UnitType, team: Team, cost: number, available: number) {
  logger.info(
    { unitType, team, cost, available, event: 'summon_refused' },
    `${team} cannot afford ${unitType}: needs ${cost}, has ${available}`
  );
}

/**
 * Log end-of-level teardown
 */
export function logLevelTeardown(destroyed: number) {
  logger.info({ destroyed, event: 'level_teardown' }, `Level teardown destroyed ${destroyed} units`);
}

/**
 * Log startup validation of the unit catalog
 */
export function logCatalogValidated(unitTypes: UnitType[]) {
  logger.info(
    { unitTypes, event: 'catalog_validated' },
    `Unit catalog valid: ${unitTypes.join(', ')}`
  );
}
