import test from 'node:test';
import assert from 'node:assert/strict';

import {
    buildPrompt,
    truncateInput,
    getInstructionTemplate,
    getCodeAnalysisPrompt,
    getRequirementsAnalysisPrompt,
    getSchemaSection,
    getWorkedExample,
} from '../src/prompts';
import { COMPONENT_KINDS } from '../src/graph_types';

test('each input kind selects its own instruction template', () => {
    assert.equal(getInstructionTemplate('CODE'), getCodeAnalysisPrompt());
    assert.equal(getInstructionTemplate('REQUIREMENTS'), getRequirementsAnalysisPrompt());
    assert.match(getCodeAnalysisPrompt(), /between 5 and 10 components/);
    assert.match(getRequirementsAnalysisPrompt(), /between 4 and 8 components/);
});

test('prompt is template, schema, example, then the user input', () => {
    const prompt = buildPrompt('CODE', 'int speed;');
    assert.equal(
        prompt,
        [getCodeAnalysisPrompt(), getSchemaSection(), getWorkedExample(), 'USER INPUT DATA:\nint speed;'].join('\n\n')
    );
});

test('schema section names every known component kind', () => {
    const schema = getSchemaSection();
    for (const kind of COMPONENT_KINDS) {
        assert.ok(schema.includes(kind), `schema should mention ${kind}`);
    }
});

test('only the user input is truncated', () => {
    const prompt = buildPrompt('REQUIREMENTS', 'abcdef', { maxInputChars: 4 });
    assert.ok(prompt.startsWith(getRequirementsAnalysisPrompt()));
    assert.ok(prompt.endsWith('USER INPUT DATA:\nabcd\n[input truncated: 4 of 6 characters kept]'));
});

test('retry feedback is appended after the input', () => {
    const prompt = buildPrompt('REQUIREMENTS', 'The pump shall stop.', { retryFeedback: 'Missing "components" field' });
    assert.ok(prompt.endsWith(
        'USER INPUT DATA:\nThe pump shall stop.\n\n' +
        'PREVIOUS ATTEMPT REJECTED:\nMissing "components" field\nReturn a corrected JSON object that follows the schema.'
    ));
});

test('truncation never splits a surrogate pair', () => {
    assert.deepEqual(truncateInput('ab\u{1F600}c', 3), { text: 'ab', truncated: true, originalLength: 5 });
    assert.deepEqual(truncateInput('abc', 3), { text: 'abc', truncated: false, originalLength: 3 });
});
