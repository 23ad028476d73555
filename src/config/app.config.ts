/**
 * Application Configuration
 * Centralized configuration management for the ledger node
 */
import { parseTarget } from '../ledger/target.js';
import { EXPECTED_TIMESPAN_SECONDS } from '../ledger/difficulty.js';
import { logger, VALID_LOG_LEVELS } from './logger.config.js';
import type { Target } from '../types/ledger.js';

export interface ChainConfig {
  initialTarget: Target;
  maxTarget: Target;
  expectedTimespan: number;
}

export interface MiningConfig {
  batchSize: number;
  timeoutMs: number;
}

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  environment: string;
  chain: ChainConfig;
  mining: MiningConfig;
}

function parsePositiveInteger(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function parseTargetVariable(name: string, value: string): Target {
  try {
    return parseTarget(value);
  } catch (error) {
    throw new Error(`${name} is invalid: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Load configuration from environment variables with validation
 * @returns AppConfig object with validated configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const config: AppConfig = {
    port: parseInt(env.PORT || '3000', 10),
    host: env.HOST || '0.0.0.0',
    logLevel: env.LOG_LEVEL || 'info',
    environment: env.NODE_ENV || 'development',
    chain: {
      initialTarget: parseTargetVariable('INITIAL_TARGET', env.INITIAL_TARGET || '207fffff'),
      maxTarget: parseTargetVariable('MAX_TARGET', env.MAX_TARGET || '207fffff'),
      expectedTimespan: parsePositiveInteger(
        'EXPECTED_TIMESPAN_SECONDS',
        env.EXPECTED_TIMESPAN_SECONDS || String(EXPECTED_TIMESPAN_SECONDS)
      )
    },
    mining: {
      batchSize: parsePositiveInteger('MINING_BATCH_SIZE', env.MINING_BATCH_SIZE || '2000'),
      timeoutMs: parsePositiveInteger('MINING_TIMEOUT_MS', env.MINING_TIMEOUT_MS || '60000')
    }
  };

  if (isNaN(config.port) || config.port < 1 || config.port > 65535) {
    throw new Error('PORT must be a valid port number between 1 and 65535');
  }

  // Validate log level
  if (!VALID_LOG_LEVELS.includes(config.logLevel)) {
    throw new Error(`LOG_LEVEL must be one of: ${VALID_LOG_LEVELS.join(', ')}`);
  }

  if (config.chain.initialTarget > config.chain.maxTarget) {
    throw new Error('INITIAL_TARGET cannot be easier than MAX_TARGET');
  }

  // Validate environment
  const validEnvironments = ['development', 'test', 'production'];
  if (!validEnvironments.includes(config.environment)) {
    logger.warn(`Unknown environment: ${config.environment}. Valid environments: ${validEnvironments.join(', ')}`);
  }

  return config;
}

/**
 * Get default configuration for testing
 * @returns AppConfig object with test defaults
 */
export function getTestConfig(): AppConfig {
  return {
    port: 0, // Let the system assign a port
    host: '127.0.0.1',
    logLevel: 'silent',
    environment: 'test',
    chain: {
      initialTarget: 0x207fffff,
      maxTarget: 0x207fffff,
      expectedTimespan: EXPECTED_TIMESPAN_SECONDS
    },
    mining: {
      batchSize: 500,
      timeoutMs: 5000
    }
  };
}
