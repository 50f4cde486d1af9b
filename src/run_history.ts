// run_history.ts — append-only log of pipeline runs
//
// Display-only: nothing reads history back into a run. One session writes at
// a time; each record is a single appended JSON line.

import * as fs from 'fs';
import * as path from 'path';
import { InputKind } from './graph_types';
import { createLogger, Logger } from './logger';

export type RunSource = InputKind | 'EXPORTED_GRAPH';

export interface RunRecord {
    runId: string;
    timestamp: string;
    success: boolean;
    attempts: number;
    source: RunSource;
    systemName: string | null;
    errorCode: string | null;
}

export interface RunHistory {
    append(record: RunRecord): void;
    /** Newest first */
    list(limit?: number): RunRecord[];
    close(): void;
}

export class InMemoryRunHistory implements RunHistory {
    private readonly records: RunRecord[] = [];

    append(record: RunRecord): void {
        this.records.push({ ...record });
    }

    list(limit?: number): RunRecord[] {
        const newestFirst = [...this.records].reverse();
        return limit === undefined ? newestFirst : newestFirst.slice(0, Math.max(0, limit));
    }

    close(): void {
        // nothing to release
    }
}

const SOURCES: readonly RunSource[] = ['CODE', 'REQUIREMENTS', 'EXPORTED_GRAPH'];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nullableString(value: unknown): string | null | undefined {
    if (value === null) return null;
    return typeof value === 'string' ? value : undefined;
}

/** Field-checked form of one history line; null when the line is not a run record. */
export function parseRunRecord(value: unknown): RunRecord | null {
    if (!isRecord(value)) return null;
    const { runId, timestamp, success, attempts, source } = value;
    const systemName = nullableString(value.systemName);
    const errorCode = nullableString(value.errorCode);
    if (typeof runId !== 'string' || typeof timestamp !== 'string') return null;
    if (typeof success !== 'boolean' || typeof attempts !== 'number') return null;
    const runSource = SOURCES.find((s) => s === source);
    if (runSource === undefined || systemName === undefined || errorCode === undefined) return null;
    return { runId, timestamp, success, attempts, source: runSource, systemName, errorCode };
}

/** JSON Lines file, oldest record first. */
export class JsonlRunHistory implements RunHistory {
    private readonly log: Logger;

    constructor(readonly filePath: string, logger?: Logger) {
        this.log = logger ?? createLogger('run_history');
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
    }

    append(record: RunRecord): void {
        fs.appendFileSync(this.filePath, JSON.stringify(record) + '\n', 'utf-8');
    }

    list(limit: number = 50): RunRecord[] {
        if (!fs.existsSync(this.filePath)) return [];
        const records: RunRecord[] = [];
        const lines = fs.readFileSync(this.filePath, 'utf-8').split('\n');
        lines.forEach((line, index) => {
            if (line.trim() === '') return;
            let value: unknown;
            try {
                value = JSON.parse(line);
            } catch (e) {
                this.log.warn('Skipping unreadable history line', {
                    line: index + 1,
                    error: e instanceof Error ? e.message : String(e),
                });
                return;
            }
            const record = parseRunRecord(value);
            if (record) {
                records.push(record);
            } else {
                this.log.warn('Skipping malformed history line', { line: index + 1 });
            }
        });
        return records.reverse().slice(0, Math.max(0, Math.floor(limit)));
    }

    close(): void {
        // appends are synchronous; nothing stays open
    }
}
