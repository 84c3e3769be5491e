/**
 * Configuration Loader
 *
 * Loads environment variables and provides typed configuration for the service.
 * Uses dotenv for local development.
 *
 * The config object is built once at process start; collaborators receive the
 * slice they need as constructor arguments and never read process.env themselves.
 */

import dotenv from 'dotenv';

dotenv.config();

export interface Config {
  // Server
  port: number;
  nodeEnv: string;
  logLevel: string;

  // Cleanup run
  cleanup: {
    rulesFile: string;
    dryRun: boolean;
    runOnStartup: boolean;
    continuousMode: boolean;
    schedule: string;
  };

  // Aiven API
  aiven: {
    apiUrl: string;
    apiToken: string;
    project: string;
  };

  // Webhook notification
  notification: {
    webhookUrl: string;
    titleLink?: string;
  };

  // Cleanup history (optional audit trail)
  database: {
    enabled: boolean;
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
    maxConnections: number;
    ssl: boolean;
  };

  // Service
  service: {
    name: string;
    version: string;
  };
}

type Env = Record<string, string | undefined>;

function flag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') {
    return fallback;
  }
  return value.toLowerCase() === 'true';
}

export function loadConfig(env: Env = process.env): Config {
  const nodeEnv = env.NODE_ENV || 'development';

  return {
    port: parseInt(env.PORT || '3000', 10),
    nodeEnv,
    logLevel: env.LOG_LEVEL || (nodeEnv === 'production' ? 'info' : 'debug'),

    cleanup: {
      rulesFile: env.RULES_FILE || 'rules.yaml',
      dryRun: flag(env.CLEANUP_DRY_RUN, false),
      runOnStartup: flag(env.RUN_ON_STARTUP, true),
      continuousMode: flag(env.CONTINUOUS_MODE, false),
      // Daily at 03:00 server time
      schedule: env.CLEANUP_SCHEDULE || '0 3 * * *',
    },

    aiven: {
      apiUrl: env.AIVEN_API_URL || 'https://api.aiven.io',
      apiToken: env.AIVEN_API_TOKEN || '',
      project: env.AIVEN_PROJECT || '',
    },

    notification: {
      webhookUrl: env.NOTIFICATION_WEBHOOK_URL || '',
      titleLink: env.NOTIFICATION_TITLE_LINK || undefined,
    },

    database: {
      enabled: flag(env.HISTORY_ENABLED, false),
      host: env.PGHOST || 'localhost',
      port: parseInt(env.PGPORT || '5432', 10),
      database: env.PGDATABASE || 'index_cleanup',
      user: env.PGUSER || 'postgres',
      password: env.PGPASSWORD || 'postgres',
      maxConnections: parseInt(env.PG_MAX_CONNECTIONS || '5', 10),
      ssl: env.PGSSLMODE === 'require',
    },

    service: {
      name: env.SERVICE_NAME || 'index-cleanup-service',
      version: env.npm_package_version || '1.0.0',
    },
  };
}

export const config: Config = loadConfig();
