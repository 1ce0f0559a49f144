import fs from 'fs';
import log, { configureLogging } from './logger';

export const CONFIG_ENV_VAR = 'LABEL_COMPOSER_CONFIG';

export type LogLevelOption = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly' | false;

export interface LabelConfig {
    margin: number; // left/right alignment margin, canvas units
    background: string;
    fontDirectory?: string;
    logLevel: LogLevelOption;
    logFile?: string;
}

export const DEFAULT_CONFIG: LabelConfig = {
    margin: 5,
    background: '#FFFFFF',
    logLevel: 'info',
};

const LOG_LEVELS: readonly LogLevelOption[] = ['error', 'warn', 'info', 'verbose', 'debug', 'silly', false];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLogLevel(value: unknown): value is LogLevelOption {
    return LOG_LEVELS.some(level => level === value);
}

/**
 * Merges a parsed config document over the defaults. Fields with the wrong type are
 * dropped (and reported) rather than failing the whole load.
 */
export function resolveConfig(raw: unknown): LabelConfig {
    const config: LabelConfig = { ...DEFAULT_CONFIG };
    if (!isRecord(raw)) {
        log.warn('[Config] Config document is not an object, using defaults');
        return config;
    }

    const rejected: string[] = [];

    if (raw.margin !== undefined) {
        if (typeof raw.margin === 'number' && Number.isFinite(raw.margin) && raw.margin >= 0) config.margin = raw.margin;
        else rejected.push('margin');
    }
    if (raw.background !== undefined) {
        if (typeof raw.background === 'string') config.background = raw.background;
        else rejected.push('background');
    }
    if (raw.fontDirectory !== undefined) {
        if (typeof raw.fontDirectory === 'string') config.fontDirectory = raw.fontDirectory;
        else rejected.push('fontDirectory');
    }
    if (raw.logLevel !== undefined) {
        if (isLogLevel(raw.logLevel)) config.logLevel = raw.logLevel;
        else rejected.push('logLevel');
    }
    if (raw.logFile !== undefined) {
        if (typeof raw.logFile === 'string') config.logFile = raw.logFile;
        else rejected.push('logFile');
    }

    if (rejected.length > 0) {
        log.warn(`[Config] Ignoring invalid fields: ${rejected.join(', ')}`);
    }
    return config;
}

/**
 * Loads the config file named by `configPath`, or by the LABEL_COMPOSER_CONFIG
 * environment variable. A missing or unreadable file yields the defaults.
 */
export function loadConfig(configPath: string | undefined = process.env[CONFIG_ENV_VAR]): LabelConfig {
    let config = resolveConfig({});
    if (configPath) {
        try {
            if (fs.existsSync(configPath)) {
                const data = fs.readFileSync(configPath, 'utf-8');
                const parsed: unknown = JSON.parse(data);
                config = resolveConfig(parsed);
                log.info(`[Config] Loaded ${configPath}`);
            } else {
                log.warn(`[Config] Config file not found: ${configPath}, using defaults`);
            }
        } catch (error) {
            log.warn(`[Config] Failed to load ${configPath}, using defaults:`, error);
        }
    }

    configureLogging({ level: config.logLevel, file: config.logFile });
    return config;
}
