/**
 * Test: the <component>_full_details.json document
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import {
    definitionFileName,
    loadDefinition,
    parseDefinition,
    saveDefinition,
    serializeDefinition,
} from '../src/definition.js';
import { parseSnippet } from '../src/snippet.js';
import type { ComponentDefinition } from '../src/types.js';
import assert from 'node:assert/strict';

console.log('Running definition tests...\n');

const snippet = '<Button variant="outlined" sx={{ mt: 1 }}>Click <b>me</b></Button>';

const definition: ComponentDefinition = {
    name: 'Button',
    properties: {
        disabled: { type: 'bool', default: 'false', description: 'If `true`, the component is disabled.' },
    },
    cssClasses: [{ className: '.MuiButton-root', ruleName: 'root', description: 'Styles applied to the root element.' }],
    variations: [
        {
            name: 'Button-_variant-outlined',
            rawSourceText: snippet,
            matchedClassNames: ['MuiButton-root', 'MuiButton-outlined'],
            inferredProperties: { variant: 'outlined', size: 'medium' },
            parsedNode: parseSnippet(snippet),
        },
    ],
};

// ── Test 1: JSON round trip ──────────────────────────────────────────────────
{
    const json = serializeDefinition(definition);
    assert.deepEqual(parseDefinition(json), definition);
    assert.ok(json.startsWith('{\n  "name": "Button",'));
    console.log('✓ Test 1 passed: serialize then parse gives the same definition');
}

// ── Test 2: missing fields fall back to empty values ─────────────────────────
{
    assert.deepEqual(parseDefinition('{"name":"Chip"}'), {
        name: 'Chip',
        properties: {},
        cssClasses: [],
        variations: [],
    });

    const partial = parseDefinition('{"name":"Chip","variations":[{"name":"v","extra":1}]}');
    assert.deepEqual(partial.variations, [{
        name: 'v',
        rawSourceText: '',
        matchedClassNames: [],
        inferredProperties: {},
        parsedNode: { tagName: null, attributes: {}, innerText: '', children: [], rawStyleRules: {} },
    }]);
    console.log('✓ Test 2 passed: lenient loading');
}

// ── Test 3: file naming, save and load ───────────────────────────────────────
{
    assert.equal(definitionFileName('IconButton'), 'iconbutton_full_details.json');

    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docs2uitk-def-'));
    const filePath = saveDefinition(dir, definition);
    assert.equal(filePath, path.join(dir, 'button_full_details.json'));
    assert.ok(fs.readFileSync(filePath, 'utf-8').endsWith('}\n'));

    assert.deepEqual(loadDefinition(dir, 'BUTTON'), definition);
    assert.equal(loadDefinition(dir, 'Card'), null);

    fs.rmSync(dir, { recursive: true, force: true });
    console.log('✓ Test 3 passed: save and load');
}

// ── Test 4: hand-edited values are coerced instead of rejected ───────────────
{
    const edited = parseDefinition(JSON.stringify({
        properties: { elevation: { type: 'number', default: 1, description: null } },
        cssClasses: 'none',
        variations: [{
            name: 'Paper-Raised',
            matchedClassNames: ['MuiPaper-root', 3],
            inferredProperties: { elevation: 2, square: true },
            parsedNode: { tagName: 'Paper', attributes: { elevation: 2 }, children: 'oops' },
        }],
    }));

    assert.equal(edited.name, '');
    assert.deepEqual(edited.properties, { elevation: { type: 'number', default: '1', description: '' } });
    assert.deepEqual(edited.cssClasses, []);
    assert.deepEqual(edited.variations[0].matchedClassNames, ['MuiPaper-root', '3']);
    assert.deepEqual(edited.variations[0].inferredProperties, { elevation: '2', square: 'true' });
    assert.deepEqual(edited.variations[0].parsedNode, {
        tagName: 'Paper',
        attributes: { elevation: '2' },
        innerText: '',
        children: [],
        rawStyleRules: {},
    });

    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docs2uitk-def-'));
    fs.writeFileSync(path.join(dir, 'paper_full_details.json'), '{"variations":[]}');
    assert.deepEqual(loadDefinition(dir, 'Paper'), { name: 'Paper', properties: {}, cssClasses: [], variations: [] });
    fs.rmSync(dir, { recursive: true, force: true });
    console.log('✓ Test 4 passed: numbers and booleans become strings, a missing name comes from the file');
}

console.log('\n✅ All definition tests passed!');
