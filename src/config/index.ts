// src/config/index.ts
import path from 'path';
import { ConfigurationError } from '../core/common/errors';

// --- Interfaces ---

const NODE_ENVS = ['development', 'production', 'test'] as const;
const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type NodeEnv = typeof NODE_ENVS[number];
export type LogLevel = typeof LOG_LEVELS[number];

interface ParsingConfig {
    /** Fraction of rejected rows above which an extract counts as unusable. */
    readonly maxRejectedRatio: number;
}

interface ReportConfig {
    readonly lateStartAfter: string;   // HH:mm:ss
    readonly workedLateAfter: string;  // HH:mm:ss
    readonly timeoutMs: number;
}

interface UploadConfig {
    readonly maxFileSizeBytes: number;
}

// Define the structure of our main application configuration
export interface AppConfig {
    readonly nodeEnv: NodeEnv;
    readonly port: number;
    readonly logLevel: LogLevel;
    readonly aliasTablePath: string;
    readonly parsing: ParsingConfig;
    readonly report: ReportConfig;
    readonly upload: UploadConfig;
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

function parseFloatEnv(varName: string, defaultValue?: number): number {
    const valueStr = process.env[varName];
    if (valueStr) {
        const valueFloat = parseFloat(valueStr);
        if (!isNaN(valueFloat)) {
            return valueFloat;
        }
        throw new ConfigurationError(`Invalid float format for environment variable ${varName}: ${valueStr}`);
    }
    if (defaultValue !== undefined) {
        return defaultValue;
    }
    throw new ConfigurationError(`Missing required environment variable: ${varName}`);
}

function parseEnumEnv<T extends string>(varName: string, allowed: readonly T[], defaultValue: T): T {
    const valueStr = process.env[varName];
    if (!valueStr) {
        return defaultValue;
    }
    const match = allowed.find(candidate => candidate === valueStr);
    if (match === undefined) {
        throw new ConfigurationError(`Invalid value for ${varName}: ${valueStr}. Expected one of: ${allowed.join(', ')}`);
    }
    return match;
}

function parseTimeOfDayEnv(varName: string, defaultValue: string): string {
    const valueStr = process.env[varName] || defaultValue;
    const match = valueStr.match(/^(\d{2}):(\d{2})(?::(\d{2}))?$/);
    if (!match || Number(match[1]) > 23 || Number(match[2]) > 59 || Number(match[3] ?? '0') > 59) {
        throw new ConfigurationError(`Invalid time of day for ${varName}: ${valueStr}. Expected HH:mm or HH:mm:ss`);
    }
    return `${match[1]}:${match[2]}:${match[3] ?? '00'}`;
}

// --- Load, Validate, and Export Configuration ---
export function loadConfig(): AppConfig {
    const maxRejectedRatio = parseFloatEnv('PARSE_MAX_REJECTED_RATIO', 0.9);
    if (maxRejectedRatio < 0 || maxRejectedRatio > 1) {
        throw new ConfigurationError(`PARSE_MAX_REJECTED_RATIO must be between 0 and 1, got ${maxRejectedRatio}`);
    }

    const loaded: AppConfig = {
        nodeEnv: parseEnumEnv('NODE_ENV', NODE_ENVS, 'development'),
        port: parseIntEnv('APP_PORT', 3000),
        logLevel: parseEnumEnv('LOG_LEVEL', LOG_LEVELS, 'info'),
        aliasTablePath: path.resolve(process.env.ALIAS_TABLE_PATH || path.join('data', 'district_mapping.yml')),

        parsing: {
            maxRejectedRatio,
        },

        report: {
            lateStartAfter: parseTimeOfDayEnv('REPORT_LATE_START_AFTER', '09:15:00'),
            workedLateAfter: parseTimeOfDayEnv('REPORT_WORKED_LATE_AFTER', '16:00:00'),
            timeoutMs: parseIntEnv('REPORT_TIMEOUT_MS', 120_000),
        },

        upload: {
            maxFileSizeBytes: parseIntEnv('UPLOAD_MAX_FILE_MB', 20) * 1024 * 1024,
        },
    };

    // --- Freeze Configuration ---
    Object.freeze(loaded.parsing);
    Object.freeze(loaded.report);
    Object.freeze(loaded.upload);
    return Object.freeze(loaded);
}

const config = loadConfig();

// --- Export ---
export default config;
