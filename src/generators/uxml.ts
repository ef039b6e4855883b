/**
 * UXML generator: one markup document per component variation, built from the
 * variation's parsed snippet. Variant, color and size are left to the USS
 * classes; only behavioural props become UXML attributes.
 */

import { TEXT_NODE, type ComponentDefinition, type ParsedNode, type Variation } from '../types.js';

export interface UxmlDocument {
    variationName: string;
    fileName: string;
    content: string;
}

export interface UxmlOutput {
    documents: UxmlDocument[];
    /** Variations whose parsed snippet had no tag */
    skipped: string[];
}

interface XmlElement {
    tag: string;
    attributes: Map<string, string>;
    children: XmlElement[];
}

function xmlElement(tag: string): XmlElement {
    return { tag, attributes: new Map(), children: [] };
}

// ── Mapping ────────────────────────────────────────────────────────────────────

export function uxmlTagFor(component: string): string {
    switch (component.toLowerCase()) {
        case 'button':
        case 'iconbutton':
            return 'ui:Button';
        case 'typography':
            return 'ui:Label';
        default:
            return 'ui:VisualElement';
    }
}

/** Maps a snippet attribute to a UXML attribute, or null when USS handles it. */
export function uxmlAttributeFor(name: string, value: string): [string, string] | null {
    switch (name) {
        case 'text':
            return ['text', value];
        case 'disabled':
            return ['enable-raycast', value === 'true' ? 'false' : 'true'];
        case 'loading':
            return ['loading', value];
        case 'loadingPosition':
            return ['loading-position', value];
        default:
            return null;
    }
}

function buildElement(node: ParsedNode): XmlElement | null {
    if (!node.tagName) return null;

    if (node.tagName === TEXT_NODE) {
        const label = xmlElement('ui:Label');
        label.attributes.set('text', node.innerText.trim());
        return label;
    }

    const el = xmlElement(uxmlTagFor(node.tagName));
    for (const [name, value] of Object.entries(node.attributes)) {
        const mapped = uxmlAttributeFor(name, value);
        if (mapped) el.attributes.set(mapped[0], mapped[1]);
    }

    const text = node.innerText.trim();
    if (text && !el.attributes.has('text')) {
        if (el.tag === 'ui:Label' || el.tag === 'ui:Button') {
            el.attributes.set('text', text);
        } else {
            const label = xmlElement('ui:Label');
            label.attributes.set('text', text);
            label.attributes.set('name', 'inner-text-label');
            el.children.push(label);
        }
    }

    for (const child of node.children) {
        const childEl = buildElement(child);
        if (!childEl) continue;
        if (child.tagName && child.tagName.includes('Icon')) {
            childEl.attributes.set('name', `${child.tagName.toLowerCase()}-icon`);
        }
        el.children.push(childEl);
    }
    return el;
}

// ── Serialisation ──────────────────────────────────────────────────────────────

function escapeAttribute(value: string): string {
    return value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/\n/g, '&#10;');
}

function serializeElement(el: XmlElement, depth: number, lines: string[]): void {
    const pad = '    '.repeat(depth);
    const attrs = [...el.attributes].map(([name, value]) => ` ${name}="${escapeAttribute(value)}"`).join('');
    if (el.children.length === 0) {
        lines.push(`${pad}<${el.tag}${attrs}/>`);
        return;
    }
    lines.push(`${pad}<${el.tag}${attrs}>`);
    for (const child of el.children) serializeElement(child, depth + 1, lines);
    lines.push(`${pad}</${el.tag}>`);
}

export function uxmlFileName(variationName: string): string {
    return `${variationName.replace(/ /g, '_').replace(/\//g, '_').toLowerCase()}.uxml`;
}

/** Renders one variation, or null when its parsed snippet has no tag. */
export function generateVariationUxml(variation: Variation): string | null {
    const root = buildElement(variation.parsedNode);
    if (!root) return null;

    if (variation.matchedClassNames.length > 0) {
        const existing = (root.attributes.get('class') ?? '').split(/\s+/).filter(Boolean);
        const classes = [...new Set([...existing, ...variation.matchedClassNames])].sort();
        root.attributes.set('class', classes.join(' '));
    }
    root.attributes.set('name', variation.name.replace(/[ _]/g, '-'));

    const document = xmlElement('ui:UXML');
    document.attributes.set('xmlns:ui', 'UnityEngine.UIElements');
    document.attributes.set('xmlns:uie', 'UnityEditor.UIElements');
    document.children.push(root);

    const lines = ['<?xml version="1.0" encoding="utf-8"?>'];
    serializeElement(document, 0, lines);
    return lines.join('\n') + '\n';
}

/** Returns `fileName`, or `<stem>-2.uxml`, `<stem>-3.uxml`, … when it is taken. */
function claimFileName(fileName: string, taken: Set<string>): string {
    const stem = fileName.slice(0, -'.uxml'.length);
    let candidate = fileName;
    for (let n = 2; taken.has(candidate); n++) {
        candidate = `${stem}-${n}.uxml`;
    }
    taken.add(candidate);
    return candidate;
}

export function generateUxml(definition: ComponentDefinition): UxmlOutput {
    const output: UxmlOutput = { documents: [], skipped: [] };
    const fileNames = new Set<string>();
    for (const variation of definition.variations) {
        const content = generateVariationUxml(variation);
        if (content === null) {
            output.skipped.push(variation.name);
            continue;
        }
        output.documents.push({
            variationName: variation.name,
            fileName: claimFileName(uxmlFileName(variation.name), fileNames),
            content,
        });
    }
    return output;
}
