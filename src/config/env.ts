import { cleanEnv, str, num, bool } from 'envalid';
import dotenv from 'dotenv';

// Load .env file
dotenv.config();

/**
 * Validated environment variables
 *
 * Using envalid for runtime validation and type safety:
 * - Validates types (string, number, boolean)
 * - Enforces choices for enums
 * - Provides defaults for development/test
 * - Fails fast on startup if a variable has the wrong shape
 */
export const env = cleanEnv(process.env, {
  // ==========================================
  // Server Configuration
  // ==========================================
  NODE_ENV: str({
    choices: ['development', 'test', 'production'],
    default: 'development',
    desc: 'Application environment (affects logging, error handling, CORS)',
  }),
  PORT: num({
    default: 3000,
    desc: 'HTTP server port',
  }),
  TRUST_PROXY_HOPS: num({
    default: 1,
    desc: 'Number of reverse proxies in front of the API (used for client IP detection)',
  }),

  // ==========================================
  // Storage Configuration
  // ==========================================
  STORAGE_DRIVER: str({
    choices: ['memory', 'postgres'],
    default: 'memory',
    desc: 'Where portfolios, quotes and the equity directory live',
  }),
  DIRECTORY_SEED_PATH: str({
    default: 'data/equity-directory.json',
    desc: 'Equity directory seed file for the memory driver (relative to the project root)',
  }),

  // ==========================================
  // Database Configuration (STORAGE_DRIVER=postgres)
  // ==========================================
  DB_HOST: str({
    default: 'localhost',
    desc: 'PostgreSQL host',
  }),
  DB_PORT: num({
    default: 5432,
    desc: 'PostgreSQL port',
  }),
  DB_NAME: str({
    default: 'equity_portfolio',
    desc: 'PostgreSQL database name',
  }),
  DB_USER: str({
    default: 'postgres',
    desc: 'PostgreSQL username',
  }),
  DB_PASSWORD: str({
    default: 'postgres', // Only for dev - production MUST set this explicitly
    desc: 'PostgreSQL password (REQUIRED in production)',
  }),
  DB_SSL: bool({
    default: false,
    desc: 'Connect to PostgreSQL over TLS (managed databases)',
  }),
  DB_MAX_CONNECTIONS: num({
    default: 20,
    desc: 'Maximum database connection pool size',
  }),

  // ==========================================
  // Logging Configuration
  // ==========================================
  LOG_LEVEL: str({
    choices: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
    default: 'info',
    desc: 'Minimum log level to output',
  }),
  LOG_PRETTY: bool({
    default: true,
    desc: 'Pretty-print logs in development (false for JSON logs)',
  }),

  // ==========================================
  // Metrics Configuration
  // ==========================================
  METRICS_TYPE: str({
    choices: ['noop', 'cloudwatch'],
    default: 'noop',
    desc: 'Metrics backend',
  }),
  AWS_REGION: str({
    default: 'us-east-1',
    desc: 'AWS region for CloudWatch',
  }),
  CLOUDWATCH_METRICS_NAMESPACE: str({
    default: 'EquityPortfolio',
    desc: 'CloudWatch Metrics namespace',
  }),
});
