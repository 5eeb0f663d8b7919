// src/config/index.ts
import { ConfigurationError } from '../core/common/errors';

// --- Interfaces ---

const NODE_ENVS = ['development', 'production', 'test'] as const;
const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type NodeEnv = typeof NODE_ENVS[number];
export type LogLevel = typeof LOG_LEVELS[number];

// SQLite file behind the invoice store (":memory:" for an in-process database)
interface DatabaseConfig {
    readonly type: 'sqljs';
    readonly database: string;
    readonly synchronize: boolean;
    readonly logging: boolean;
}

interface DocumentConfig {
    /** Banner text at the top of every rendered invoice workbook */
    readonly title: string;
    /** Workbook "creator" property */
    readonly creator: string;
}

export interface AppConfig {
    readonly nodeEnv: NodeEnv;
    readonly port: number;
    readonly logLevel: LogLevel;
    readonly upload: {
        readonly maxFileSizeMb: number;
    };
    readonly document: DocumentConfig;
    readonly database: DatabaseConfig;
}

// --- Helper Functions ---
function parseIntEnv(varName: string, defaultValue?: number): number {
    const valueStr = process.env[varName];
    if (valueStr) {
        const valueInt = parseInt(valueStr, 10);
        if (!isNaN(valueInt)) {
            return valueInt;
        }
        throw new ConfigurationError(`Invalid integer format for environment variable ${varName}: ${valueStr}`);
    }
    if (defaultValue !== undefined) {
        return defaultValue;
    }
    throw new ConfigurationError(`Missing required environment variable: ${varName}`);
}

function parseBooleanEnv(varName: string, defaultValue: boolean): boolean {
    const valueStr = process.env[varName];
    if (!valueStr) {
        return defaultValue;
    }
    if (valueStr === 'true') return true;
    if (valueStr === 'false') return false;
    throw new ConfigurationError(`Invalid boolean for environment variable ${varName}: ${valueStr} (expected 'true' or 'false')`);
}

function parseEnumEnv<T extends string>(varName: string, allowed: readonly T[], defaultValue: T): T {
    const valueStr = process.env[varName];
    if (!valueStr) {
        return defaultValue;
    }
    const match = allowed.find(candidate => candidate === valueStr);
    if (match === undefined) {
        throw new ConfigurationError(`Invalid value for environment variable ${varName}: ${valueStr}. Allowed: ${allowed.join(', ')}`);
    }
    return match;
}

// --- Load, Validate, and Export Configuration ---
const nodeEnv = parseEnumEnv('NODE_ENV', NODE_ENVS, 'development');

const config: AppConfig = {
    nodeEnv,
    port: parseIntEnv('APP_PORT', 3000),
    logLevel: parseEnumEnv('LOG_LEVEL', LOG_LEVELS, nodeEnv === 'test' ? 'error' : 'info'),

    upload: {
        maxFileSizeMb: parseIntEnv('UPLOAD_MAX_FILE_SIZE_MB', 20),
    },

    document: {
        title: process.env.DOCUMENT_TITLE || 'NOTA FISCAL DE SERVIÇO',
        creator: process.env.DOCUMENT_CREATOR || 'Billing Invoice Service',
    },

    database: {
        type: 'sqljs',
        database: process.env.DB_PATH || 'invoices.db',
        synchronize: parseBooleanEnv('DB_SYNCHRONIZE', true),
        logging: parseBooleanEnv('DB_LOGGING', false),
    },
};

if (config.upload.maxFileSizeMb <= 0) {
    throw new ConfigurationError(`UPLOAD_MAX_FILE_SIZE_MB must be positive, got ${config.upload.maxFileSizeMb}`);
}

// --- Freeze Configuration ---
Object.freeze(config);
Object.freeze(config.upload);
Object.freeze(config.document);
Object.freeze(config.database);

export default config;
