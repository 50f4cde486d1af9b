import test from 'node:test';
import assert from 'node:assert/strict';

import { PipelineOrchestrator, PipelineOptions, SessionContext } from '../src/pipeline_orchestrator';
import { Oracle } from '../src/model_router';
import { InMemoryRunHistory } from '../src/run_history';
import { FileDocumentExtractor, DocumentExtractor } from '../src/document_extractor';
import { OracleError, DocumentExtractionError } from '../src/structured_error';
import { silentLogger } from '../src/logger';
import { buildPrompt, getCodeAnalysisPrompt } from '../src/prompts';
import { renderDiagram } from '../src/diagram_renderer';
import { renderBuildScript } from '../src/build_script_renderer';
import { serializeGraph } from '../src/graph_file';
import { speedControlGraph, SPEED_CONTROL_REPLY } from './fixtures';

const NOW = '2024-03-01T10:00:00.000Z';
const now = () => new Date(NOW);
const INPUT = 'The controller shall scale the measured speed by two.';

class ScriptedOracle implements Oracle {
    readonly prompts: string[] = [];

    constructor(private readonly replies: Array<string | OracleError>) {}

    async generate(prompt: string): Promise<string> {
        this.prompts.push(prompt);
        const next = this.replies.shift();
        if (next === undefined) throw new Error('scripted oracle ran out of replies');
        if (next instanceof OracleError) throw next;
        return next;
    }
}

function setup(
    replies: Array<string | OracleError>,
    options: PipelineOptions = {},
    session: Partial<SessionContext> = {}
) {
    const oracle = new ScriptedOracle(replies);
    const history = new InMemoryRunHistory();
    const pipeline = new PipelineOrchestrator(
        {
            oracle,
            history,
            logger: silentLogger,
            now,
            documentExtractor: new FileDocumentExtractor(silentLogger),
            ...session,
        },
        options
    );
    return { oracle, history, pipeline };
}

const FULL_PASS = ['BUILDING_PROMPT', 'AWAITING_ORACLE', 'EXTRACTING', 'VALIDATING', 'RENDERING', 'DONE'];

test('a clean reply produces all three artifacts in one attempt', async () => {
    const { oracle, history, pipeline } = setup([SPEED_CONTROL_REPLY]);
    const result = await pipeline.run('REQUIREMENTS', INPUT);

    assert.ok(result.ok);
    assert.equal(result.attempts, 1);
    assert.deepEqual(result.transitions, FULL_PASS);
    assert.deepEqual(result.graph, speedControlGraph());
    assert.equal(result.artifacts.graphJson, serializeGraph(speedControlGraph()));
    assert.equal(result.artifacts.diagram, renderDiagram(speedControlGraph()));
    assert.equal(result.artifacts.buildScript, renderBuildScript(speedControlGraph(), { now }));
    assert.deepEqual(result.warnings, []);
    assert.deepEqual(oracle.prompts, [buildPrompt('REQUIREMENTS', INPUT)]);

    assert.deepEqual(history.list(), [{
        runId: result.runId,
        timestamp: NOW,
        success: true,
        attempts: 1,
        source: 'REQUIREMENTS',
        systemName: 'Speed_Control',
        errorCode: null,
    }]);
});

test('an unparseable reply is retried with the reason appended', async () => {
    const { oracle, pipeline } = setup(['I think the design is fine.', '```json\n' + SPEED_CONTROL_REPLY + '\n```']);
    const result = await pipeline.run('REQUIREMENTS', INPUT);

    assert.ok(result.ok);
    assert.equal(result.attempts, 2);
    assert.deepEqual(result.transitions, [
        'BUILDING_PROMPT', 'AWAITING_ORACLE', 'EXTRACTING',
        ...FULL_PASS,
    ]);
    assert.equal(oracle.prompts[1], buildPrompt('REQUIREMENTS', INPUT, {
        retryFeedback: 'Could not parse architecture from the oracle reply',
    }));
});

test('with feedback off the identical prompt is re-issued', async () => {
    const { oracle, pipeline } = setup(['{"system_name": "X"}', SPEED_CONTROL_REPLY], { feedbackOnRetry: false });
    const result = await pipeline.run('CODE', 'int speed;');

    assert.ok(result.ok);
    assert.equal(result.attempts, 2);
    assert.equal(oracle.prompts.length, 2);
    assert.equal(oracle.prompts[1], oracle.prompts[0]);
});

test('the run fails after the attempt bound with the last error', async () => {
    const bad = '{"system_name": "X"}';
    const { oracle, history, pipeline } = setup([bad, bad, bad, SPEED_CONTROL_REPLY], { maxAttempts: 3 });
    const result = await pipeline.run('REQUIREMENTS', INPUT);

    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.attempts, 3);
    assert.equal(result.error.code, 'VALIDATION_FAILED');
    assert.equal(result.error.message, 'Architecture failed schema validation: Missing "components" field');
    assert.equal(result.error.context.attempts, 3);
    assert.equal(result.transitions[result.transitions.length - 1], 'FAILED');
    assert.equal(oracle.prompts.length, 3);
    assert.equal(result.rawResponse, undefined);

    const [entry] = history.list();
    assert.equal(entry.success, false);
    assert.equal(entry.errorCode, 'VALIDATION_FAILED');
    assert.equal(entry.systemName, null);
    assert.equal(entry.attempts, 3);
});

test('credential errors are retried up to the attempt bound', async () => {
    const denied = () => new OracleError('AUTH', 'bad key', false, 401);
    const { oracle, pipeline, history } = setup([denied(), denied(), denied()]);
    const result = await pipeline.run('REQUIREMENTS', INPUT);

    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.code, 'ORACLE_ERROR');
    assert.equal(result.attempts, 3);
    assert.equal(result.error.context.attempts, 3);
    assert.equal(oracle.prompts.length, 3);
    assert.equal(result.transitions[result.transitions.length - 1], 'FAILED');
    assert.equal(history.list()[0].errorCode, 'ORACLE_ERROR');
});

test('a credential error followed by a good reply succeeds', async () => {
    const { oracle, pipeline } = setup([new OracleError('AUTH', 'bad key', false, 401), SPEED_CONTROL_REPLY]);
    const result = await pipeline.run('REQUIREMENTS', INPUT);
    assert.ok(result.ok);
    assert.equal(result.attempts, 2);
    assert.equal(oracle.prompts.length, 2);
    assert.equal(oracle.prompts[0], oracle.prompts[1]);
});

test('transient oracle errors are retried', async () => {
    const { pipeline } = setup([new OracleError('TIMEOUT', 'timeout after 10ms', true), SPEED_CONTROL_REPLY]);
    const result = await pipeline.run('REQUIREMENTS', INPUT);
    assert.ok(result.ok);
    assert.equal(result.attempts, 2);
});

test('debug sessions keep the raw reply of a failed run', async () => {
    const debug = setup(['garbage'], { maxAttempts: 1 }, { debug: true });
    const failed = await debug.pipeline.run('REQUIREMENTS', INPUT);
    assert.equal(failed.ok, false);
    if (!failed.ok) {
        assert.equal(failed.error.code, 'EXTRACTION_FAILED');
        assert.equal(failed.rawResponse, 'garbage');
    }

    const quiet = setup(['garbage'], { maxAttempts: 1 });
    const result = await quiet.pipeline.run('REQUIREMENTS', INPUT);
    assert.equal(result.ok, false);
    assert.equal('rawResponse' in result, false);
});

test('empty input never reaches the oracle', async () => {
    const { oracle, history, pipeline } = setup([SPEED_CONTROL_REPLY]);
    const result = await pipeline.run('CODE', '  \n ');

    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.code, 'INVALID_INPUT');
    assert.equal(result.attempts, 0);
    assert.equal(oracle.prompts.length, 0);
    assert.equal(history.list()[0].errorCode, 'INVALID_INPUT');
});

test('a second run while one is in flight is rejected', async () => {
    let release: (reply: string) => void = () => undefined;
    const gated: Oracle = {
        generate: () => new Promise<string>((resolve) => {
            release = resolve;
        }),
    };
    const history = new InMemoryRunHistory();
    const pipeline = new PipelineOrchestrator({ oracle: gated, history, logger: silentLogger, now });

    const first = pipeline.run('REQUIREMENTS', INPUT);
    assert.equal(pipeline.busy, true);
    const second = await pipeline.run('REQUIREMENTS', INPUT);

    release(SPEED_CONTROL_REPLY);
    const firstResult = await first;

    assert.ok(firstResult.ok);
    assert.equal(second.ok, false);
    if (second.ok) return;
    assert.equal(second.error.code, 'PIPELINE_BUSY');
    assert.equal(second.error.context.active_run_id, firstResult.runId);
    assert.equal(pipeline.busy, false);
    assert.deepEqual(history.list().map((r) => r.runId), [firstResult.runId]);
});

test('warnings from normalization and rendering are collected', async () => {
    const reply = JSON.stringify({
        system_name: 'Plant',
        components: [{ name: 'KF', type: 'KalmanFilter' }],
        connections: [{ source: 'KF/1', destination: 'Ghost/1' }],
    });
    const { pipeline } = setup([reply]);
    const result = await pipeline.run('REQUIREMENTS', INPUT);

    assert.ok(result.ok);
    assert.deepEqual(result.warnings, [
        'components[0] "KF" has unknown type "KalmanFilter"; rendering as a subsystem',
        'connections[0] omitted from diagram: unknown destination "Ghost/1"',
    ]);
    assert.ok(result.artifacts.buildScript.includes("    add_line('Plant', 'KF/1', 'Ghost/1', 'autorouting', 'on');"));
});

test('exported graphs are re-rendered without the oracle', async () => {
    const { oracle, history, pipeline } = setup([]);
    const result = await pipeline.renderExisting(JSON.parse(SPEED_CONTROL_REPLY));

    assert.ok(result.ok);
    assert.equal(result.attempts, 0);
    assert.deepEqual(result.transitions, ['VALIDATING', 'RENDERING', 'DONE']);
    assert.equal(result.artifacts.diagram, renderDiagram(speedControlGraph()));
    assert.equal(oracle.prompts.length, 0);
    assert.equal(history.list()[0].source, 'EXPORTED_GRAPH');

    const invalid = await pipeline.renderExisting({ system_name: 'X' });
    assert.equal(invalid.ok, false);
    if (invalid.ok) return;
    assert.equal(invalid.error.code, 'VALIDATION_FAILED');
    assert.deepEqual(invalid.transitions, ['VALIDATING', 'FAILED']);
});

test('uploaded files are joined under file headers and classified', async () => {
    const { oracle, history, pipeline } = setup([SPEED_CONTROL_REPLY]);
    const result = await pipeline.generateFromFiles([
        { name: 'pid.c', content: Buffer.from('int a;', 'utf8') },
        { name: 'pid.h', content: Buffer.from('int b;', 'utf8') },
    ]);

    assert.ok(result.ok);
    assert.equal(oracle.prompts[0], buildPrompt('CODE', '\n// FILE: pid.c\nint a;\n// FILE: pid.h\nint b;'));
    assert.ok(oracle.prompts[0].startsWith(getCodeAnalysisPrompt()));
    assert.equal(history.list()[0].source, 'CODE');
});

test('the kind override beats extension detection', async () => {
    const { oracle, pipeline } = setup([SPEED_CONTROL_REPLY]);
    await pipeline.generateFromFiles([{ name: 'notes.c', content: Buffer.from('shall stop', 'utf8') }], 'REQUIREMENTS');
    assert.equal(oracle.prompts[0], buildPrompt('REQUIREMENTS', '\n// FILE: notes.c\nshall stop'));
});

test('a file that cannot be extracted fails the run before the oracle', async () => {
    const failing: DocumentExtractor = {
        extractText: async (file) => {
            throw new DocumentExtractionError(file.name, 'unreadable PDF: bad header');
        },
    };
    const { oracle, pipeline } = setup([SPEED_CONTROL_REPLY], {}, { documentExtractor: failing });
    const result = await pipeline.generateFromFiles([{ name: 'req.pdf', content: Buffer.from('x') }]);

    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.code, 'DOCUMENT_EXTRACTION_FAILED');
    assert.equal(result.error.message, 'req.pdf: unreadable PDF: bad header');
    assert.equal(oracle.prompts.length, 0);
});

test('an empty file list is invalid input', async () => {
    const { pipeline } = setup([]);
    const result = await pipeline.generateFromFiles([]);
    assert.equal(result.ok, false);
    if (!result.ok) assert.equal(result.error.code, 'INVALID_INPUT');
});

test('a spaced system name runs end to end with three blocks and two lines', async () => {
    const reply = JSON.stringify({
        systemName: 'Speed Control',
        components: [
            { name: 'SpeedIn', type: 'Inport' },
            { name: 'Gain1', type: 'Gain', parameters: { Gain: '2.0' } },
            { name: 'SpeedOut', type: 'Outport' },
        ],
        connections: [
            { source: 'SpeedIn/1', destination: 'Gain1/1' },
            { source: 'Gain1/1', destination: 'SpeedOut/1' },
        ],
    });
    const { pipeline, history } = setup([reply]);
    const result = await pipeline.run('REQUIREMENTS', INPUT);

    assert.ok(result.ok);
    assert.equal(result.graph.systemName, 'Speed Control');
    assert.deepEqual(result.warnings, []);

    const script = result.artifacts.buildScript.split('\n');
    assert.ok(script.includes("new_system('Speed_Control');"));
    assert.equal(script.filter((l) => /^\s+add_block\(/.test(l)).length, 3);
    assert.equal(script.filter((l) => /add_line\(/.test(l)).length, 2);
    assert.ok(script.includes("    add_block('simulink/Math Operations/Gain', 'Speed_Control/Gain1');"));
    assert.ok(script.includes("    add_line('Speed_Control', 'SpeedIn/1', 'Gain1/1', 'autorouting', 'on');"));

    assert.deepEqual(result.artifacts.diagram.split('\n'), [
        'graph LR',
        '    blk_SpeedIn(["SpeedIn"])',
        '    blk_Gain1[/"Gain1"\\]',
        '    blk_SpeedOut>"SpeedOut"]',
        '    blk_SpeedIn --> blk_Gain1',
        '    blk_Gain1 --> blk_SpeedOut',
    ]);
    assert.equal(history.list()[0].systemName, 'Speed Control');
});

test('an unknown component type becomes a subsystem in both artifacts', async () => {
    const reply = JSON.stringify({
        system_name: 'Plant',
        components: [
            { name: 'In', type: 'Inport' },
            { name: 'Filter', type: 'FooBar' },
        ],
        connections: [{ source: 'In/1', destination: 'Filter/1' }],
    });
    const { pipeline } = setup([reply]);
    const result = await pipeline.run('REQUIREMENTS', INPUT);

    assert.ok(result.ok);
    assert.deepEqual(result.graph.components[1].type, { kind: 'Other', rawType: 'FooBar' });
    assert.deepEqual(result.warnings, ['components[1] "Filter" has unknown type "FooBar"; rendering as a subsystem']);
    assert.ok(result.artifacts.buildScript.split('\n').includes("    add_block('built-in/Subsystem', 'Plant/Filter');"));
    assert.ok(result.artifacts.diagram.split('\n').includes('    blk_Filter["Filter"]'));
    assert.ok(result.artifacts.diagram.split('\n').includes('    blk_In --> blk_Filter'));
});
