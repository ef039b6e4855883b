/**
 * Test: snippet parser and snippet extraction
 */

import { extractSnippets, findElement, parseSnippet } from '../src/snippet.js';
import { emptyNode, textNode, TEXT_NODE, type ParsedNode } from '../src/types.js';
import assert from 'node:assert/strict';

console.log('Running snippet parser tests...\n');

function element(tagName: string, innerText: string = '', attributes: Record<string, string> = {}): ParsedNode {
    return { tagName, attributes, innerText, children: [], rawStyleRules: {} };
}

// ── Test 1: self-closing tag has no children ─────────────────────────────────
{
    const node = parseSnippet('<Button variant="outlined" />');
    assert.deepEqual(node, element('Button', '', { variant: 'outlined' }));
    console.log('✓ Test 1 passed: self-closing tag');
}

// ── Test 2: plain text content becomes innerText ─────────────────────────────
{
    const node = parseSnippet('<Button variant="contained">Contained</Button>');
    assert.deepEqual(node, element('Button', 'Contained', { variant: 'contained' }));
    console.log('✓ Test 2 passed: inner text');
}

// ── Test 3: mixed content is split into text and element children ───────────
{
    const node = parseSnippet('<Button>Click <b>me</b> now</Button>');
    assert.equal(node.innerText, '');
    assert.deepEqual(node.children, [textNode('Click'), element('b', 'me'), textNode('now')]);

    // text children plus element text give back the content
    const rebuilt = node.children
        .map(child => (child.tagName === TEXT_NODE ? child.innerText : `<${child.tagName}>${child.innerText}</${child.tagName}>`))
        .join(' ');
    assert.equal(rebuilt, 'Click <b>me</b> now');
    console.log('✓ Test 3 passed: mixed text and element children');
}

// ── Test 4: nested tags with the same name bracket correctly ─────────────────
{
    const node = parseSnippet('<Box><Box>a</Box></Box>');
    assert.deepEqual(node, { ...element('Box'), children: [element('Box', 'a')] });

    const span = findElement('<Box><Box>a</Box></Box> tail');
    assert.ok(span);
    assert.equal(span.end, '<Box><Box>a</Box></Box>'.length);
    console.log('✓ Test 4 passed: same-name nesting');
}

// ── Test 5: sx and style go to rawStyleRules ─────────────────────────────────
{
    const node = parseSnippet("<Button sx={{ mt: 2, color: 'primary.main' }} style={{ width: 120 }}>Go</Button>");
    assert.deepEqual(node.attributes, {});
    assert.deepEqual(node.rawStyleRules, { mt: '2', color: 'primary.main', width: '120' });

    const div = parseSnippet('<div style="color: red; margin: 4px">x</div>');
    assert.deepEqual(div.rawStyleRules, { color: 'red', margin: '4px' });
    console.log('✓ Test 5 passed: style attributes');
}

// ── Test 6: boolean values are lower-cased ───────────────────────────────────
{
    const node = parseSnippet('<Button disabled={True} loading>Save</Button>');
    assert.deepEqual(node.attributes, { disabled: 'true', loading: 'true' });
    console.log('✓ Test 6 passed: boolean attributes');
}

// ── Test 7: malformed input yields the empty shell ───────────────────────────
{
    assert.deepEqual(parseSnippet('plain text'), emptyNode());
    assert.deepEqual(parseSnippet(''), emptyNode());
    assert.deepEqual(parseSnippet('<Button>Open'), element('Button'));
    console.log('✓ Test 7 passed: empty shell and unclosed tag');
}

// ── Test 8: snippets are taken out of layout wrappers ────────────────────────
{
    const code = [
        '<Stack direction="row" spacing={2}>',
        '  <Button variant="text">Text</Button>',
        '  <Button variant="contained">Contained</Button>',
        '</Stack>',
    ].join('\n');

    assert.deepEqual(extractSnippets(code, 'Button'), [
        '<Button variant="text">Text</Button>',
        '<Button variant="contained">Contained</Button>',
    ]);
    assert.deepEqual(extractSnippets(code), [code]);
    console.log('✓ Test 8 passed: wrapper unwrapped for the component tag');
}

// ── Test 9: extraction fallbacks ─────────────────────────────────────────────
{
    assert.deepEqual(
        extractSnippets('<Stack><Chip /><LoadingButton loading>B</LoadingButton></Stack>', 'Button'),
        ['<LoadingButton loading>B</LoadingButton>'],
    );
    assert.deepEqual(extractSnippets('<Chip label="a" />', 'Button'), ['<Chip label="a" />']);
    assert.deepEqual(extractSnippets('  const x = 1;  ', 'Button'), ['const x = 1;']);
    assert.deepEqual(extractSnippets('   '), []);
    console.log('✓ Test 9 passed: other components, no component, no element');
}

console.log('\n✅ All snippet parser tests passed!');
