import { AppConfig } from './types';
import { isValidTimezone } from './env';

interface ConfigValidationRule {
    message: string;
    when: (cfg: AppConfig, nodeEnv: string) => boolean;
}

const CONFIG_VALIDATION_RULES: ConfigValidationRule[] = [
    {
        message: '[CONFIG] MAX_DELAY_SECONDS deve essere >= MIN_DELAY_SECONDS',
        when: (cfg) => cfg.maxDelaySeconds < cfg.minDelaySeconds,
    },
    {
        message: '[CONFIG] DEFAULT_DELAY_SECONDS deve essere compreso tra MIN_DELAY_SECONDS e MAX_DELAY_SECONDS',
        when: (cfg) => cfg.defaultDelaySeconds < cfg.minDelaySeconds || cfg.defaultDelaySeconds > cfg.maxDelaySeconds,
    },
    {
        message: '[CONFIG] DEFAULT_BATCH_SIZE deve essere >= 1',
        when: (cfg) => cfg.defaultBatchSize < 1,
    },
    {
        message: '[CONFIG] DEFAULT_DAILY_LIMIT deve essere >= 1',
        when: (cfg) => cfg.defaultDailyLimit < 1,
    },
    {
        message: '[CONFIG] RETRY_LIMIT deve essere >= 1',
        when: (cfg) => cfg.retryLimit < 1,
    },
    {
        message: '[CONFIG] ALLOW_ADMIN_AS_WORKER e ALLOW_USER_WORKERS sono entrambi false: nessun ruolo può eseguire aggiunte',
        when: (cfg) => !cfg.allowAdminAsWorker && !cfg.allowUserWorkers,
    },
    {
        message: '[CONFIG] PLATFORM_CAPABILITY_SHA256 deve essere un digest sha256 esadecimale (64 caratteri)',
        when: (cfg) => !!cfg.platformCapabilitySha256 && !/^[0-9a-f]{64}$/.test(cfg.platformCapabilitySha256),
    },
    {
        message: '[CONFIG] TIMEZONE non riconosciuta',
        when: (cfg) => !isValidTimezone(cfg.timezone),
    },
    {
        message: '[CONFIG] DASHBOARD_AUTH_ENABLED=true ma DASHBOARD_API_KEY è vuota',
        when: (cfg) => cfg.dashboardAuthEnabled && !cfg.dashboardApiKey,
    },
    {
        message: '[CONFIG] NODE_ENV=production ma DATABASE_URL non configurata — verrà usato SQLite (non raccomandato in produzione)',
        when: (cfg, nodeEnv) => nodeEnv === 'production' && !cfg.databaseUrl,
    },
];

export function validateConfigSchema(config: AppConfig, nodeEnv: string = process.env.NODE_ENV ?? ''): string[] {
    const errors: string[] = [];
    for (const rule of CONFIG_VALIDATION_RULES) {
        if (rule.when(config, nodeEnv)) {
            errors.push(rule.message);
        }
    }
    return errors;
}
