import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { serializeGraph, parseGraphFile, readGraphFile, toWireGraph } from '../src/graph_file';
import { isArchitectureRecord, toArchitectureGraph } from '../src/schema_validator';
import { renderDiagram } from '../src/diagram_renderer';
import { renderBuildScript } from '../src/build_script_renderer';
import { ArchitectureGraph } from '../src/graph_types';
import { speedControlGraph } from './fixtures';

function reload(text: string): ArchitectureGraph {
    const parsed = parseGraphFile(text);
    assert.ok(parsed.ok);
    assert.ok(isArchitectureRecord(parsed.value));
    const { graph, warnings } = toArchitectureGraph(parsed.value);
    assert.deepEqual(warnings, []);
    return graph;
}

test('exported graph reloads to the same graph and the same artifacts', () => {
    const original = speedControlGraph();
    const reloaded = reload(serializeGraph(original));
    assert.deepEqual(reloaded, original);

    const now = () => new Date('2024-01-01T00:00:00.000Z');
    assert.equal(renderDiagram(reloaded), renderDiagram(original));
    assert.equal(renderBuildScript(reloaded, { now }), renderBuildScript(original, { now }));
});

test('wire format uses snake_case and omits empty optional fields', () => {
    const wire = toWireGraph(speedControlGraph());
    assert.equal(wire.system_name, 'Speed_Control');
    assert.deepEqual(wire.components[0], { name: 'SpeedIn', type: 'Inport' });
    assert.deepEqual(wire.components[1], { name: 'SpeedGain', type: 'Gain', parameters: { Gain: '2.0' } });
    assert.deepEqual(wire.connections[1], { source: 'SpeedGain/1', destination: 'SpeedOut/1' });
    assert.ok(serializeGraph(speedControlGraph()).startsWith('{\n  "system_name": "Speed_Control",'));
});

test('unknown types survive export with their raw name', () => {
    const graph: ArchitectureGraph = {
        systemName: 'Plant',
        components: [{ name: 'KF', type: { kind: 'Other', rawType: 'KalmanFilter' }, parameters: {}, position: [1, 2, 3, 4] }],
        connections: [],
    };
    const parsed = parseGraphFile(serializeGraph(graph));
    assert.ok(parsed.ok);
    assert.ok(isArchitectureRecord(parsed.value));
    const { graph: reloaded, warnings } = toArchitectureGraph(parsed.value);
    assert.deepEqual(reloaded, graph);
    assert.deepEqual(warnings, ['components[0] "KF" has unknown type "KalmanFilter"; rendering as a subsystem']);
});

test('byte order mark is ignored and bad JSON is reported', () => {
    assert.deepEqual(parseGraphFile('\uFEFF{"a":1}'), { ok: true, value: { a: 1 } });
    const bad = parseGraphFile('{');
    assert.equal(bad.ok, false);
    if (!bad.ok) assert.match(bad.reason, /^Invalid JSON file: /);
});

test('graph files are read from disk', () => {
    const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'graph-file-'));
    try {
        const file = path.join(tmp, 'mbd_model.json');
        fs.writeFileSync(file, serializeGraph(speedControlGraph()), 'utf-8');
        const result = readGraphFile(file);
        assert.ok(result.ok);

        const missing = readGraphFile(path.join(tmp, 'missing.json'));
        assert.equal(missing.ok, false);
        if (!missing.ok) assert.ok(missing.reason.startsWith(`Cannot read ${path.join(tmp, 'missing.json')}: `));
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
});
