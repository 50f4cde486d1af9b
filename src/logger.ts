/**
 * Logger for pipeline runs.
 *
 * Every line carries the component and, while a run is active, its run id,
 * pipeline state and attempt number.
 *
 * Environment:
 *   MBD_LOG_LEVEL  = debug|info|warn|error (default: info)
 *   MBD_LOG_JSON   = 1 for one JSON object per line
 *   MBD_LOG_FILE   = path, lines are also appended there
 *   MBD_DEBUG      = 1 forces debug level
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LogSettings {
    minLevel: LogLevel;
    json: boolean;
    file: string | null;
}

export function readLogSettings(env: NodeJS.ProcessEnv): LogSettings {
    const debug = env.MBD_DEBUG === '1' || env.MBD_DEBUG === 'true';
    const requested = (env.MBD_LOG_LEVEL ?? '').toLowerCase();
    const level: LogLevel =
        requested === 'debug' || requested === 'warn' || requested === 'error' ? requested : 'info';
    return {
        minLevel: debug ? 'debug' : level,
        json: env.MBD_LOG_JSON === '1',
        file: env.MBD_LOG_FILE || null,
    };
}

const settings = readLogSettings(process.env);

export interface RunCorrelation {
    runId: string;
    state: string;
    attempt: number;
}

const IDLE: RunCorrelation = { runId: '', state: '', attempt: 0 };
let correlation: RunCorrelation = { ...IDLE };

/** Update the active run context; the orchestrator calls this as a run advances. */
export function setCorrelation(update: Partial<RunCorrelation>): void {
    correlation = { ...correlation, ...update };
}

export function clearCorrelation(): void {
    correlation = { ...IDLE };
}

export interface LogRecord {
    ts: string;
    level: LogLevel;
    component: string;
    msg: string;
    run?: RunCorrelation;
    data?: Record<string, unknown>;
}

export function formatRecord(record: LogRecord, json: boolean): string {
    const { ts, level, component, msg, run, data } = record;
    if (json) {
        return JSON.stringify({
            ts,
            level,
            component,
            msg,
            run_id: run?.runId || undefined,
            state: run?.state || undefined,
            attempt: run?.attempt || undefined,
            data,
        });
    }
    let tag = '';
    if (run && run.runId) {
        tag = ` [${run.runId.slice(0, 8)}`;
        if (run.state) tag += `:${run.state}`;
        if (run.attempt) tag += `#${run.attempt}`;
        tag += ']';
    }
    const suffix = data ? ` ${JSON.stringify(data)}` : '';
    return `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${tag} ${msg}${suffix}`;
}

function emit(level: LogLevel, component: string, msg: string, data?: Record<string, unknown>): void {
    if (SEVERITY[level] < SEVERITY[settings.minLevel]) return;

    const run = correlation.runId ? { ...correlation } : undefined;
    const line = formatRecord({ ts: new Date().toISOString(), level, component, msg, run, data }, settings.json) + '\n';
    (SEVERITY[level] >= SEVERITY.warn ? process.stderr : process.stdout).write(line);

    if (settings.file) {
        try {
            fs.appendFileSync(settings.file, line);
        } catch (e) {
            process.stderr.write(`[logger] cannot append to ${settings.file}: ${e instanceof Error ? e.message : String(e)}\n`);
        }
    }
}

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
    child(component: string): Logger;
}

export function createLogger(component: string): Logger {
    return {
        debug: (msg, data) => emit('debug', component, msg, data),
        info: (msg, data) => emit('info', component, msg, data),
        warn: (msg, data) => emit('warn', component, msg, data),
        error: (msg, data) => emit('error', component, msg, data),
        child: (sub) => createLogger(`${component}:${sub}`),
    };
}

/** Drops everything. */
export const silentLogger: Logger = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
    child: () => silentLogger,
};
