import path from 'path';
import { EnvReader } from './env';
import { DashboardDomainConfig, LogLevelSetting, RuntimeDomainConfig, SupervisorDomainConfig } from './types';

const LOG_LEVELS: readonly LogLevelSetting[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function buildRuntimeDomainConfig(env: EnvReader): RuntimeDomainConfig {
    return {
        dbPath: env.path('DB_PATH', path.join('data', 'supervisor.sqlite')),
        databaseUrl: env.string('DATABASE_URL'),
        allowSqliteInProduction: env.bool('ALLOW_SQLITE_IN_PRODUCTION', false),
        timezone: env.string('TIMEZONE', 'UTC'),
        logLevel: env.oneOf('LOG_LEVEL', LOG_LEVELS, 'info'),
    };
}

export function buildSupervisorDomainConfig(env: EnvReader): SupervisorDomainConfig {
    return {
        minDelaySeconds: Math.max(0, env.int('MIN_DELAY_SECONDS', 5)),
        maxDelaySeconds: env.int('MAX_DELAY_SECONDS', 3600),
        defaultDelaySeconds: env.int('DEFAULT_DELAY_SECONDS', 30),
        defaultBatchSize: env.int('DEFAULT_BATCH_SIZE', 5),
        defaultDailyLimit: env.int('DEFAULT_DAILY_LIMIT', 80),
        retryLimit: env.int('RETRY_LIMIT', 3),
        // Sotto i 30s il polling diventa rumore sul DB senza benefici reali.
        idlePollSeconds: Math.max(30, env.int('IDLE_POLL_SECONDS', 120)),
        allowAdminAsWorker: env.bool('ALLOW_ADMIN_AS_WORKER', false),
        allowUserWorkers: env.bool('ALLOW_USER_WORKERS', true),
        defaultInviteMessage: env.string('DEFAULT_INVITE_MESSAGE'),
        platformCapabilityModule: env.string('PLATFORM_CAPABILITY_MODULE'),
        platformCapabilitySha256: env.string('PLATFORM_CAPABILITY_SHA256').toLowerCase(),
    };
}

export function buildDashboardDomainConfig(env: EnvReader): DashboardDomainConfig {
    return {
        dashboardPort: env.int('DASHBOARD_PORT', 3000),
        dashboardAuthEnabled: env.bool('DASHBOARD_AUTH_ENABLED', true),
        dashboardApiKey: env.string('DASHBOARD_API_KEY'),
        dashboardTrustedIps: env.csv('DASHBOARD_TRUSTED_IPS'),
    };
}
