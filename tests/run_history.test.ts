import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { InMemoryRunHistory, JsonlRunHistory, RunRecord, parseRunRecord } from '../src/run_history';
import { silentLogger } from '../src/logger';

function record(n: number, overrides: Partial<RunRecord> = {}): RunRecord {
    return {
        runId: `run-${n}`,
        timestamp: `2024-01-0${n}T00:00:00.000Z`,
        success: true,
        attempts: 1,
        source: 'CODE',
        systemName: 'Speed_Control',
        errorCode: null,
        ...overrides,
    };
}

test('in-memory history lists newest first', () => {
    const history = new InMemoryRunHistory();
    history.append(record(1));
    history.append(record(2));
    history.append(record(3));
    assert.deepEqual(history.list().map((r) => r.runId), ['run-3', 'run-2', 'run-1']);
    assert.deepEqual(history.list(2).map((r) => r.runId), ['run-3', 'run-2']);
});

test('jsonl history stores every field across sessions', () => {
    const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'history-'));
    try {
        const file = path.join(tmp, 'nested', 'history.jsonl');
        const failed = record(2, {
            success: false,
            attempts: 3,
            source: 'REQUIREMENTS',
            systemName: null,
            errorCode: 'VALIDATION_FAILED',
        });
        const first = new JsonlRunHistory(file, silentLogger);
        first.append(record(1, { source: 'EXPORTED_GRAPH' }));
        first.append(failed);
        first.close();

        const reopened = new JsonlRunHistory(file, silentLogger);
        assert.deepEqual(reopened.list(), [failed, record(1, { source: 'EXPORTED_GRAPH' })]);
        assert.deepEqual(reopened.list(1), [failed]);
        assert.equal(fs.readFileSync(file, 'utf-8').split('\n').length, 3);
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});

test('jsonl history skips unreadable and malformed lines', () => {
    const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'history-'));
    try {
        const file = path.join(tmp, 'history.jsonl');
        fs.writeFileSync(file, [
            JSON.stringify(record(1)),
            '{not json',
            JSON.stringify({ runId: 'run-x', success: 'yes' }),
            '',
            JSON.stringify(record(2)),
            '',
        ].join('\n'));
        const history = new JsonlRunHistory(file, silentLogger);
        assert.deepEqual(history.list().map((r) => r.runId), ['run-2', 'run-1']);
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});

test('a missing history file lists nothing', () => {
    const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'history-'));
    try {
        assert.deepEqual(new JsonlRunHistory(path.join(tmp, 'history.jsonl'), silentLogger).list(), []);
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});

test('run records are checked field by field', () => {
    assert.deepEqual(parseRunRecord(record(1)), record(1));
    assert.equal(parseRunRecord({ ...record(1), source: 'FIRMWARE' }), null);
    assert.equal(parseRunRecord({ ...record(1), errorCode: 7 }), null);
    assert.equal(parseRunRecord([record(1)]), null);
});
