/**
 * Test: C# element class generation
 */

import { baseClassFor, csharpTypeFor, generateCSharp } from '../src/generators/csharp.js';
import type { ComponentDefinition } from '../src/types.js';
import assert from 'node:assert/strict';

console.log('Running C# generator tests...\n');

function doc(type: string, description: string = '') {
    return { type, default: '', description };
}

const button: ComponentDefinition = {
    name: 'Button',
    properties: {
        children: doc('node'),
        disabled: doc('bool', 'If `true`, the component is disabled.\n\nMore text.'),
        loading: doc('bool'),
        loadingPosition: doc("'center' | 'end' | 'start'"),
        sx: doc('Array<func | object | bool> | func | object'),
        startIcon: doc('node', 'Element placed before the <children>.'),
    },
    cssClasses: [],
    variations: [],
};

// ── Test 1: mapping helpers ──────────────────────────────────────────────────
{
    assert.equal(baseClassFor('IconButton'), 'UnityEngine.UIElements.Button');
    assert.equal(baseClassFor('Typography'), 'UnityEngine.UIElements.Label');
    assert.equal(baseClassFor('Card'), 'UnityEngine.UIElements.VisualElement');
    assert.equal(csharpTypeFor(doc('bool')), 'bool');
    assert.equal(csharpTypeFor(doc('number')), 'float');
    assert.equal(csharpTypeFor(doc("'small' | 'medium'")), 'string');
    console.log('✓ Test 1 passed: base classes and property types');
}

// ── Test 2: button class ─────────────────────────────────────────────────────
{
    const code = generateCSharp(button);
    const lines = code.split('\n');

    assert.ok(lines.includes('namespace YourUnityProject.UI.MaterialUI'));
    assert.ok(lines.includes('    public class MuiButton : UnityEngine.UIElements.Button'));
    assert.ok(lines.includes('        public new static readonly string ussClassName = "MuiButton-root";'));
    assert.ok(lines.includes('            RegisterCallback<DetachFromPanelEvent>(OnDetachFromPanel);'));

    // skipped props
    assert.ok(!lines.some(line => line.includes('_children') || line.includes(' Sx')));

    // disabled toggles the element
    assert.ok(lines.includes('        /// <summary>If `true`, the component is disabled.</summary>'));
    assert.ok(lines.includes('        private bool _disabled;'));
    assert.ok(lines.includes('                SetEnabled(!value);'));
    assert.ok(lines.includes('                EnableInClassList("Mui-disabled", value);'));

    // loading state
    assert.ok(lines.includes('        private bool _loading;'));
    assert.ok(lines.includes('        private string _loadingPosition = "";'));
    assert.ok(lines.includes('            if (Loading)'));
    assert.ok(lines.includes('                if (LoadingPosition == "start")'));

    // summary text is escaped
    assert.ok(lines.includes('        /// <summary>Element placed before the &lt;children&gt;.</summary>'));
    console.log('✓ Test 2 passed: button properties and loading state');
}

// ── Test 3: UxmlFactory and UxmlTraits ───────────────────────────────────────
{
    const lines = generateCSharp(button).split('\n');

    assert.ok(lines.includes('        public new class UxmlFactory : UxmlFactory<MuiButton, UxmlTraits> { }'));
    assert.ok(lines.includes('        public new class UxmlTraits : UnityEngine.UIElements.Button.UxmlTraits'));
    assert.ok(lines.includes(
        '            private UxmlStringAttribute _loading_positionAttribute = new UxmlStringAttribute { name = "loading-position" };',
    ));
    assert.ok(lines.includes(
        '            private UxmlBoolAttribute _disabledAttribute = new UxmlBoolAttribute { name = "disabled" };',
    ));
    assert.ok(lines.includes('                component.LoadingPosition = _loading_positionAttribute.GetValueFromBag(bag, cc);'));
    assert.ok(lines.includes('                component.StartIcon = _start_iconAttribute.GetValueFromBag(bag, cc);'));
    console.log('✓ Test 3 passed: UXML traits');
}

// ── Test 4: non-button components ────────────────────────────────────────────
{
    const code = generateCSharp({
        name: 'Card',
        properties: { raised: doc('bool'), elevation: doc('number') },
        cssClasses: [],
        variations: [],
    });
    const lines = code.split('\n');

    assert.ok(lines.includes('    public class MuiCard : UnityEngine.UIElements.VisualElement'));
    assert.ok(lines.includes('        private float _elevation;'));
    assert.ok(lines.includes('            private UxmlFloatAttribute _elevationAttribute = new UxmlFloatAttribute { name = "elevation" };'));
    assert.ok(!code.includes('UpdateLoadingState'));
    assert.ok(!code.includes('RegisterCallback'));
    assert.ok(code.endsWith('    }\n}\n'));
    console.log('✓ Test 4 passed: card class');
}

console.log('\n✅ All C# generator tests passed!');
