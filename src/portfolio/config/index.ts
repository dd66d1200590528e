/**
 * Environment Configuration
 *
 * Loads `.env` and environment variables into a typed configuration object.
 * With nothing set, the defaults reproduce the stock behaviour: inline
 * plotly.js, output under output/visualizations, layout seed 42.
 *
 * Usage:
 *   import { config } from './config';
 *   console.log(config.output.directory);
 */

import 'dotenv/config';
import path from 'path';

// =============================================================================
// Types
// =============================================================================

export type NodeEnv = 'development' | 'production' | 'test';
export type PlotlyJsMode = 'inline' | 'cdn';

export interface RuntimeConfig {
  nodeEnv: NodeEnv;
  isDevelopment: boolean;
  isProduction: boolean;
  isTest: boolean;
  logLevel: string;
}

export interface OutputConfig {
  /** Directory the HTML charts are written to */
  directory: string;
  /** How each HTML file gets plotly.js */
  plotlyJs: PlotlyJsMode;
}

export interface LayoutConfig {
  seed: number;
  iterations: number;
}

export interface PortfolioConfig {
  runtime: RuntimeConfig;
  output: OutputConfig;
  layout: LayoutConfig;
}

// =============================================================================
// Validation Helpers
// =============================================================================

class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

type Env = Record<string, string | undefined>;

function getEnvWithDefault(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

/**
 * Get a non-negative integer environment variable
 */
function getEnvInteger(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigurationError(
      `Invalid numeric value for ${key}: "${value}". Expected a non-negative integer.`
    );
  }
  return parsed;
}

function parseNodeEnv(value: string): NodeEnv {
  const valid: readonly NodeEnv[] = ['development', 'production', 'test'];
  const match = valid.find(candidate => candidate === value);
  return match ?? 'development';
}

function parsePlotlyJsMode(value: string): PlotlyJsMode {
  if (value === 'inline' || value === 'cdn') {
    return value;
  }
  throw new ConfigurationError(
    `Invalid value for PORTFOLIO_PLOTLY_JS: "${value}". Expected "inline" or "cdn".`
  );
}

// =============================================================================
// Configuration Loader
// =============================================================================

export function loadConfig(env: Env = process.env): PortfolioConfig {
  const nodeEnv = parseNodeEnv(getEnvWithDefault(env, 'NODE_ENV', 'development'));
  const defaultLogLevel = nodeEnv === 'test' ? 'silent' : 'info';

  const config: PortfolioConfig = {
    runtime: {
      nodeEnv,
      isDevelopment: nodeEnv === 'development',
      isProduction: nodeEnv === 'production',
      isTest: nodeEnv === 'test',
      logLevel: getEnvWithDefault(env, 'LOG_LEVEL', defaultLogLevel),
    },

    output: {
      directory: path.resolve(getEnvWithDefault(env, 'PORTFOLIO_OUTPUT_DIR', 'output/visualizations')),
      plotlyJs: parsePlotlyJsMode(getEnvWithDefault(env, 'PORTFOLIO_PLOTLY_JS', 'inline')),
    },

    layout: {
      seed: getEnvInteger(env, 'PORTFOLIO_LAYOUT_SEED', 42),
      iterations: getEnvInteger(env, 'PORTFOLIO_LAYOUT_ITERATIONS', 50),
    },
  };

  return config;
}

// =============================================================================
// Export
// =============================================================================

/**
 * Configuration loaded from the environment at import time.
 */
export const config: PortfolioConfig = loadConfig();

export { ConfigurationError };
