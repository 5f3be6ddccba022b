import dotenv from 'dotenv';

dotenv.config();

/**
 * Settings that govern punch submission, retry and retention.
 */
export interface PunchSettings {
    endpoint: string;
    timeoutSeconds: number;
    maxRetryAttempts: number;
    backoffBaseSeconds: number;
    backoffCapSeconds: number;
    retentionDays: number;
}

export interface Config {
    port: number;
    nodeEnv: string;
    punch: PunchSettings;
    soap: {
        namespace: string;
        username: string;
        password: string;
        clientId: string;
    };
    sync: {
        pollIntervalSeconds: number;
        batchSize: number;
    };
    storage: {
        queueDir: string;
        retentionSchedule: string;
    };
    camera: {
        snapshotUrl?: string;
        timeoutSeconds: number;
    };
    logging: {
        level: string;
        file: string;
    };
}

type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, key: string, defaultValue?: string): string {
    const value = env[key] || defaultValue;
    if (!value) {
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return value;
}

function getEnvVarOptional(env: Env, key: string, defaultValue?: string): string | undefined {
    return env[key] || defaultValue;
}

function getEnvNumber(env: Env, key: string, defaultValue?: string): number {
    const raw = getEnvVar(env, key, defaultValue);
    const value = Number(raw);
    if (!Number.isFinite(value) || value <= 0) {
        throw new Error(`Environment variable ${key} must be a positive number, got "${raw}"`);
    }
    return value;
}

function getEnvInt(env: Env, key: string, defaultValue?: string): number {
    const value = getEnvNumber(env, key, defaultValue);
    if (!Number.isInteger(value)) {
        throw new Error(`Environment variable ${key} must be an integer, got "${value}"`);
    }
    return value;
}

export function loadConfig(env: Env = process.env): Config {
    let endpoint = getEnvVar(env, 'SOAP_ENDPOINT');
    // service paths are appended to the endpoint
    if (!endpoint.endsWith('/')) {
        endpoint += '/';
    }

    const config: Config = {
        port: getEnvInt(env, 'PORT', '3000'),
        nodeEnv: getEnvVar(env, 'NODE_ENV', 'development'),
        punch: {
            endpoint,
            timeoutSeconds: getEnvNumber(env, 'SOAP_TIMEOUT_SECONDS', '10'),
            maxRetryAttempts: getEnvInt(env, 'SYNC_MAX_RETRY_ATTEMPTS', '10'),
            backoffBaseSeconds: getEnvNumber(env, 'SYNC_BACKOFF_BASE_SECONDS', '5'),
            backoffCapSeconds: getEnvNumber(env, 'SYNC_BACKOFF_CAP_SECONDS', '300'),
            retentionDays: getEnvInt(env, 'STORAGE_RETENTION_DAYS', '30'),
        },
        soap: {
            namespace: getEnvVar(env, 'SOAP_NAMESPACE', 'http://msiwebtrax.com/'),
            username: getEnvVar(env, 'SOAP_USERNAME'),
            password: getEnvVar(env, 'SOAP_PASSWORD'),
            clientId: getEnvVar(env, 'SOAP_CLIENT_ID'),
        },
        sync: {
            pollIntervalSeconds: getEnvInt(env, 'SYNC_POLL_INTERVAL_SECONDS', '30'),
            batchSize: getEnvInt(env, 'SYNC_BATCH_SIZE', '50'),
        },
        storage: {
            queueDir: getEnvVar(env, 'QUEUE_DIR', './data/queue'),
            retentionSchedule: getEnvVar(env, 'RETENTION_SCHEDULE', '0 3 * * *'),
        },
        camera: {
            snapshotUrl: getEnvVarOptional(env, 'CAMERA_SNAPSHOT_URL'),
            timeoutSeconds: getEnvNumber(env, 'CAMERA_TIMEOUT_SECONDS', '3'),
        },
        logging: {
            level: getEnvVar(env, 'LOG_LEVEL', 'info'),
            file: getEnvVar(env, 'LOG_FILE', './logs/punch-bridge.log'),
        },
    };

    // Validate configuration
    if (config.punch.backoffCapSeconds < config.punch.backoffBaseSeconds) {
        throw new Error('SYNC_BACKOFF_CAP_SECONDS must not be lower than SYNC_BACKOFF_BASE_SECONDS');
    }

    return config;
}

const config = loadConfig();

export default config;
