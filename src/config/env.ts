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
 * - Fails fast on startup if a variable is malformed
 *
 * Analysis parameters that change per run (thresholds, windows, periods) live in
 * analysisRules.ts and can be overridden per request; only the deployment-level
 * choices (reporting currency, benchmark, lookback) are read from the environment.
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

  // ==========================================
  // Database Configuration
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
    default: 'asset_valuation',
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
  DB_MAX_CONNECTIONS: num({
    default: 10,
    desc: 'Maximum database connection pool size',
  }),
  DB_SSL: bool({
    default: false,
    desc: 'Connect to PostgreSQL over TLS',
  }),

  // ==========================================
  // Logging & Metrics
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
  LOGGER_TYPE: str({
    choices: ['console', 'cloudwatch'],
    default: 'console',
    desc: 'Log output flavour',
  }),
  METRICS_TYPE: str({
    choices: ['memory', 'cloudwatch', 'noop'],
    default: 'memory',
    desc: 'Metrics backend (memory feeds GET /api/metrics)',
  }),
  AWS_REGION: str({
    default: 'us-east-1',
    desc: 'AWS region for CloudWatch',
  }),
  CLOUDWATCH_METRICS_NAMESPACE: str({
    default: 'AssetValuation',
    desc: 'CloudWatch Metrics namespace',
  }),

  // ==========================================
  // Analysis Defaults
  // ==========================================
  REPORTING_CURRENCY: str({
    default: 'USD',
    desc: 'Currency every price is normalized into',
  }),
  BENCHMARK_TICKER: str({
    default: '^GSPC',
    desc: 'Ticker of the benchmark series used for relative performance',
  }),
  BENCHMARK_CURRENCY: str({
    default: 'USD',
    desc: 'Native currency of the benchmark series',
  }),
  HISTORY_LOOKBACK_DAYS: num({
    default: 460,
    desc: 'Calendar days of price history loaded per run (~15 months)',
  }),
  REBALANCE_TOP_N: num({
    default: 3,
    desc: 'Default number of assets per side in rebalancing recommendations',
  }),
});

export type Env = typeof env;
