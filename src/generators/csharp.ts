/**
 * C# generator: emits a Unity UI Toolkit element class for a component, with
 * one property per documented prop plus the UxmlFactory / UxmlTraits pair
 * that exposes those props to UXML and the UI Builder.
 */

import { toCamelCase, toKebabCase, toPascalCase } from '../naming.js';
import type { ComponentDefinition, PropertyDoc } from '../types.js';

export const CSHARP_NAMESPACE = 'YourUnityProject.UI.MaterialUI';

/** Props handled by the element hierarchy or USS instead of C# properties. */
const SKIPPED_PROPS = new Set(['children', 'sx', 'component', 'ref']);

type CSharpType = 'bool' | 'float' | 'string';

interface CSharpProperty {
    propName: string;
    name: string;
    field: string;
    type: CSharpType;
    attribute: string;
    description: string;
}

export function baseClassFor(component: string): string {
    switch (component.toLowerCase()) {
        case 'button':
        case 'iconbutton':
            return 'UnityEngine.UIElements.Button';
        case 'typography':
            return 'UnityEngine.UIElements.Label';
        default:
            return 'UnityEngine.UIElements.VisualElement';
    }
}

export function csharpTypeFor(doc: PropertyDoc): CSharpType {
    const type = doc.type.toLowerCase();
    if (type.includes('bool')) return 'bool';
    if (type.includes('number')) return 'float';
    return 'string';
}

function collectProperties(definition: ComponentDefinition): CSharpProperty[] {
    return Object.entries(definition.properties)
        .filter(([propName]) => !SKIPPED_PROPS.has(propName.toLowerCase()))
        .map(([propName, doc]) => ({
            propName,
            name: toPascalCase(propName),
            field: `_${toCamelCase(propName)}`,
            type: csharpTypeFor(doc),
            attribute: toKebabCase(propName),
            description: doc.description,
        }))
        .filter(prop => prop.name.length > 0);
}

/** First line of a Markdown description, safe inside an XML doc comment. */
function summaryLine(description: string): string {
    const first = description.split('\n').find(line => line.trim()) ?? '';
    return first.trim()
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;');
}

function uxmlAttributeType(type: CSharpType): string {
    return `Uxml${type[0].toUpperCase()}${type.slice(1)}Attribute`;
}

function attributeField(prop: CSharpProperty): string {
    return `_${prop.attribute.replace(/-/g, '_')}Attribute`;
}

// ── Emitters ───────────────────────────────────────────────────────────────────

function emitProperty(out: string[], prop: CSharpProperty, isButton: boolean): void {
    const summary = summaryLine(prop.description);
    if (summary) {
        out.push(`        /// <summary>${summary}</summary>`);
    }

    if (prop.name === 'Disabled') {
        out.push(
            `        private ${prop.type} ${prop.field};`,
            `        public ${prop.type} ${prop.name}`,
            '        {',
            `            get => ${prop.field};`,
            '            set',
            '            {',
            `                if (${prop.field} == value) return;`,
            `                ${prop.field} = value;`,
        );
        if (prop.type === 'bool') {
            out.push(
                '                SetEnabled(!value);',
                '                EnableInClassList("Mui-disabled", value);',
            );
        }
        out.push('            }', '        }', '');
        return;
    }

    const drivesLoading = isButton && (prop.name === 'Loading' || prop.name === 'LoadingPosition');
    const type = isButton && prop.name === 'Loading' ? 'bool' : prop.type;
    const initializer = isButton && prop.name === 'LoadingPosition' ? ' = ""' : '';

    out.push(
        `        private ${type} ${prop.field}${initializer};`,
        `        public ${type} ${prop.name}`,
        '        {',
        `            get => ${prop.field};`,
        '            set',
        '            {',
        `                if (${prop.field} == value) return;`,
        `                ${prop.field} = value;`,
        drivesLoading
            ? '                UpdateLoadingState();'
            : '                // Update the element here if this prop changes its look',
        '            }',
        '        }',
        '',
    );
}

function emitLoadingSupport(out: string[]): void {
    out.push(
        '        private void OnAttachToPanel(AttachToPanelEvent evt)',
        '        {',
        '            _loadingSpinner = this.Q<VisualElement>("loading-spinner");',
        '            _innerTextLabel = this.Q<Label>("inner-text-label");',
        '            UpdateLoadingState();',
        '        }',
        '',
        '        private void OnDetachFromPanel(DetachFromPanelEvent evt)',
        '        {',
        '            _loadingSpinner = null;',
        '            _innerTextLabel = null;',
        '        }',
        '',
    );
}

function emitUpdateLoadingState(out: string[], hasLoading: boolean, hasPosition: boolean): void {
    const loading = hasLoading ? 'Loading' : 'false';
    const position = hasPosition ? 'LoadingPosition' : '""';
    out.push(
        '        private void UpdateLoadingState()',
        '        {',
        '            if (_loadingSpinner == null || _innerTextLabel == null) return;',
        '',
        `            if (${loading})`,
        '            {',
        '                _loadingSpinner.style.display = DisplayStyle.Flex;',
        '                _innerTextLabel.style.display = DisplayStyle.None;',
        `                if (${position} == "start")`,
        '                {',
        '                    style.flexDirection = FlexDirection.Row;',
        '                    style.justifyContent = Justify.FlexStart;',
        '                }',
        `                else if (${position} == "end")`,
        '                {',
        '                    style.flexDirection = FlexDirection.RowReverse;',
        '                    style.justifyContent = Justify.FlexEnd;',
        '                }',
        '                else',
        '                {',
        '                    style.flexDirection = FlexDirection.Row;',
        '                    style.justifyContent = Justify.Center;',
        '                }',
        '            }',
        '            else',
        '            {',
        '                _loadingSpinner.style.display = DisplayStyle.None;',
        '                _innerTextLabel.style.display = DisplayStyle.Flex;',
        '                style.flexDirection = FlexDirection.Row;',
        '                style.justifyContent = Justify.Center;',
        '            }',
        '        }',
        '',
    );
}

function emitUxmlTraits(out: string[], className: string, baseClass: string, props: CSharpProperty[], isButton: boolean): void {
    out.push(
        `        public new class UxmlFactory : UxmlFactory<${className}, UxmlTraits> { }`,
        '',
        `        public new class UxmlTraits : ${baseClass}.UxmlTraits`,
        '        {',
    );
    for (const prop of props) {
        const type = isButton && prop.name === 'Loading' ? 'bool' : prop.type;
        out.push(
            `            private ${uxmlAttributeType(type)} ${attributeField(prop)} = ` +
            `new ${uxmlAttributeType(type)} { name = "${prop.attribute}" };`,
        );
    }
    out.push(
        '',
        '            public override void Init(VisualElement ve, IUxmlAttributes bag, CreationContext cc)',
        '            {',
        '                base.Init(ve, bag, cc);',
        `                var component = ve as ${className};`,
        '                if (component == null) return;',
        '',
    );
    for (const prop of props) {
        out.push(`                component.${prop.name} = ${attributeField(prop)}.GetValueFromBag(bag, cc);`);
    }
    out.push('            }', '        }');
}

/** Generates `Mui<Name>.cs` for the definition. */
export function generateCSharp(definition: ComponentDefinition): string {
    const component = definition.name;
    const className = `Mui${component}`;
    const baseClass = baseClassFor(component);
    const isButton = component.toLowerCase() === 'button';
    const props = collectProperties(definition);
    const out: string[] = [];

    out.push(
        'using UnityEngine;',
        'using UnityEngine.UIElements;',
        'using System.Collections.Generic;',
        'using System.Linq;',
        '',
        `namespace ${CSHARP_NAMESPACE}`,
        '{',
        `    public class ${className} : ${baseClass}`,
        '    {',
        '        // USS class name of the component root',
        `        public new static readonly string ussClassName = "${className}-root";`,
        '',
    );

    if (isButton) {
        out.push(
            '        private VisualElement _loadingSpinner;',
            '        private Label _innerTextLabel;',
            '',
        );
    }

    out.push(
        `        public ${className}()`,
        '        {',
        '            AddToClassList(ussClassName);',
    );
    if (isButton) {
        out.push(
            '            RegisterCallback<AttachToPanelEvent>(OnAttachToPanel);',
            '            RegisterCallback<DetachFromPanelEvent>(OnDetachFromPanel);',
        );
    }
    out.push('        }', '');

    if (isButton) emitLoadingSupport(out);

    for (const prop of props) {
        emitProperty(out, prop, isButton);
    }

    if (isButton) {
        emitUpdateLoadingState(
            out,
            props.some(p => p.name === 'Loading'),
            props.some(p => p.name === 'LoadingPosition'),
        );
    }

    emitUxmlTraits(out, className, baseClass, props, isButton);
    out.push('    }', '}');

    return out.join('\n') + '\n';
}
