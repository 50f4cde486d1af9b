/**
 * Shared Configuration Constants
 *
 * Centralized configuration for the MBD architect pipeline.
 * Values can be overridden via environment variables.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export class ConfigError extends Error {
    constructor(public readonly configPath: string, message: string) {
        super(`${message} (${configPath})`);
        this.name = 'ConfigError';
    }
}

function envNumber(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const n = Number(raw);
    if (!Number.isFinite(n)) {
        process.stderr.write(`[config] ignoring non-numeric ${name}=${raw}, using ${fallback}\n`);
        return fallback;
    }
    return n;
}

// Oracle
export const DEFAULT_MODEL_ID = process.env.MBD_MODEL || 'google/gemini-pro-1.5';
export const DEFAULT_ORACLE_ENDPOINT = process.env.MBD_ORACLE_ENDPOINT || 'https://openrouter.ai/api/v1/chat/completions';
export const ORACLE_TEMPERATURE = envNumber('MBD_TEMPERATURE', 0.3);

// Pipeline limits
export const PIPELINE_LIMITS = {
    MAX_ATTEMPTS: Math.max(1, Math.floor(envNumber('MBD_MAX_ATTEMPTS', 3))),
    MAX_INPUT_CHARS: Math.max(1, Math.floor(envNumber('MBD_MAX_INPUT_CHARS', 12000))),
    MAX_WARNINGS: 200,
};

// Timeouts (milliseconds)
export const TIMEOUTS = {
    ORACLE_CALL_MS: envNumber('MBD_ORACLE_TIMEOUT_MS', 120000),
};

// Mermaid image endpoint; URLs longer than this need local rendering
export const DIAGRAM_IMAGE = {
    BASE_URL: 'https://mermaid.ink/img/',
    MAX_URL_CHARS: 8000,
};

// Artifact file names written by the CLI
export const ARTIFACT_FILES = {
    GRAPH: 'mbd_model.json',
    BUILD_SCRIPT: 'build_model.m',
    DIAGRAM: 'diagram.mmd',
} as const;

export const DEFAULT_OUTPUT_DIR = 'mbd_output';

/* -------------------------------------------------------------------------- */
/* Session config file (~/.mbd-architect/config.json)                         */
/* -------------------------------------------------------------------------- */

export interface SessionConfig {
    apiKey: string;
    modelId: string;
    endpoint: string;
    historyPath: string;
    debug: boolean;
}

export function defaultConfigDir(): string {
    return path.join(os.homedir(), '.mbd-architect');
}

export function defaultConfigPath(): string {
    return path.join(defaultConfigDir(), 'config.json');
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string, configPath: string): string | undefined {
    const value = record[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'string') {
        throw new ConfigError(configPath, `Config field "${key}" must be a string`);
    }
    return value;
}

/**
 * Resolve the session configuration. The config file is optional; environment
 * variables win over file values.
 */
export function loadSessionConfig(configPath: string = defaultConfigPath()): SessionConfig {
    let fileValues: Record<string, unknown> = {};

    if (fs.existsSync(configPath)) {
        let parsed: unknown;
        try {
            parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
        } catch (e) {
            throw new ConfigError(configPath, `Config file is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
        }
        if (!isRecord(parsed)) {
            throw new ConfigError(configPath, 'Config file must contain a JSON object');
        }
        fileValues = parsed;
    }

    const debugField = fileValues.debug;
    if (debugField !== undefined && typeof debugField !== 'boolean') {
        throw new ConfigError(configPath, 'Config field "debug" must be a boolean');
    }

    return {
        apiKey: process.env.OPENROUTER_API_KEY || stringField(fileValues, 'apiKey', configPath) || '',
        modelId: process.env.MBD_MODEL || stringField(fileValues, 'modelId', configPath) || DEFAULT_MODEL_ID,
        endpoint: process.env.MBD_ORACLE_ENDPOINT || stringField(fileValues, 'endpoint', configPath) || DEFAULT_ORACLE_ENDPOINT,
        historyPath: process.env.MBD_HISTORY_FILE
            || stringField(fileValues, 'historyPath', configPath)
            || path.join(path.dirname(configPath), 'history.jsonl'),
        debug: process.env.MBD_DEBUG === '1' || process.env.MBD_DEBUG === 'true' || debugField === true,
    };
}
