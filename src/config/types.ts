export type LogLevelSetting = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface RuntimeDomainConfig {
    dbPath: string;
    databaseUrl: string;
    allowSqliteInProduction: boolean;
    timezone: string;
    logLevel: LogLevelSetting;
}

export interface SupervisorDomainConfig {
    minDelaySeconds: number;
    maxDelaySeconds: number;
    defaultDelaySeconds: number;
    defaultBatchSize: number;
    defaultDailyLimit: number;
    retryLimit: number;
    idlePollSeconds: number;
    allowAdminAsWorker: boolean;
    allowUserWorkers: boolean;
    defaultInviteMessage: string;
    platformCapabilityModule: string;
    platformCapabilitySha256: string;
}

export interface DashboardDomainConfig {
    dashboardPort: number;
    dashboardAuthEnabled: boolean;
    dashboardApiKey: string;
    dashboardTrustedIps: string[];
}

export interface AppConfig extends RuntimeDomainConfig, SupervisorDomainConfig, DashboardDomainConfig {}
