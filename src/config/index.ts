import dotenv from 'dotenv';
import path from 'path';
import { MODES, REGIONS, type Mode, type Region } from '../types/index.js';

dotenv.config();

export interface AppConfig {
  app: {
    name: string;
    env: string;
    version: string;
    port: number;
    defaultRegion: Region;
    defaultMode: Mode;
  };
  paths: {
    dataDir: string;
    logsDir: string;
  };
  recommendations: {
    limit: number;
    visualizationLimit: number;
  };
  http: {
    corsOrigin: string;
    bodyLimit: string;
    rateLimitWindowMs: number;
    rateLimitMax: number;
  };
  logging: {
    level: string;
    stderr: boolean;
    silent: boolean;
    file: string;
    maxBytes: number;
    maxFiles: number;
  };
}

const errors: string[] = [];

function readRegion(name: string, fallback: Region): Region {
  const value = process.env[name] || fallback;
  const region = REGIONS.find((candidate) => candidate === value);
  if (!region) {
    errors.push(`${name} must be one of ${REGIONS.join(', ')} (got "${value}").`);
    return fallback;
  }
  return region;
}

function readMode(name: string, fallback: Mode): Mode {
  const value = process.env[name] || fallback;
  const mode = MODES.find((candidate) => candidate === value);
  if (!mode) {
    errors.push(`${name} must be one of ${MODES.join(', ')} (got "${value}").`);
    return fallback;
  }
  return mode;
}

function readInt(name: string, fallback: number, min = 0): number {
  const raw = process.env[name];
  const value = parseInt(raw || String(fallback), 10);
  if (Number.isNaN(value) || value < min) {
    errors.push(`${name} must be an integer >= ${min} (got "${raw}").`);
    return fallback;
  }
  return value;
}

// An explicitly empty LOG_FILE disables the file transport
const logFile = process.env.LOG_FILE ?? path.join(process.cwd(), 'logs', 'pathfinder.log');

const config: AppConfig = {
  app: {
    name: 'Career Pathfinder',
    env: process.env.NODE_ENV || 'production',
    version: '1.0.0',
    port: readInt('PORT', 5000, 1),
    defaultRegion: readRegion('DEFAULT_REGION', 'global'),
    defaultMode: readMode('DEFAULT_MODE', 'student'),
  },
  paths: {
    dataDir: process.env.DATA_DIR || path.join(process.cwd(), 'data'),
    logsDir: process.env.LOGS_DIR || path.join(process.cwd(), 'logs'),
  },
  recommendations: {
    limit: readInt('RECOMMENDATION_LIMIT', 5, 1),
    visualizationLimit: readInt('VISUALIZATION_LIMIT', 3, 1),
  },
  http: {
    corsOrigin: process.env.CORS_ORIGIN || '*',
    bodyLimit: process.env.HTTP_BODY_LIMIT || '1mb',
    rateLimitWindowMs: readInt('RATE_LIMIT_WINDOW_MS', 15 * 60 * 1000, 1),
    rateLimitMax: readInt('RATE_LIMIT_MAX', 100, 1),
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
    stderr: process.env.LOG_STDERR !== '0',
    silent: process.env.LOG_SILENT === '1',
    file: logFile,
    maxBytes: readInt('LOG_MAX_BYTES', 10 * 1024 * 1024, 1),
    maxFiles: readInt('LOG_MAX_FILES', 5, 1),
  },
};

if (errors.length > 0) {
  throw new Error(`Configuration error(s):\n - ${errors.join('\n - ')}`);
}

export default config;
