/**
 * Snippet parser
 *
 * Turns one JSX demo snippet, e.g.
 *
 *   <Button variant="contained" sx={{ mb: 2 }}>Click <b>me</b></Button>
 *
 * into a ParsedNode tree: tag name, attributes, inner text, recursively parsed
 * children and the flat style rules found in `sx` / `style`.
 *
 * This is a best-effort extractor, not a JSX parser. Expression children,
 * spread props and conditional rendering are not understood. Input with no
 * discoverable tag yields the empty shell (`tagName: null`); nothing throws.
 */

import { parseInlineStyle, parseStyleObject, scanOpeningTag, type OpeningTag } from './attributes.js';
import { emptyNode, textNode, type ParsedNode } from './types.js';

export interface ElementSpan {
    tag: OpeningTag;
    /** Start of the inner content (end of the opening tag) */
    contentStart: number;
    /** Start of the closing tag, equal to contentStart when there is none */
    contentEnd: number;
    /** Index just past the whole element */
    end: number;
}

const CLOSING_TAG = /<\/\s*([A-Za-z_$][\w$.-]*)\s*>/y;

// ── Element location ───────────────────────────────────────────────────────────

/**
 * Locates the first element at or after `from`, including its matching
 * closing tag. Nested tags with the same name are counted so that
 * `<Box><Box>a</Box></Box>` brackets correctly. An opening tag without a
 * closing tag is treated as an element with no content.
 */
export function findElement(source: string, from: number = 0): ElementSpan | null {
    const tag = scanOpeningTag(source, from);
    if (!tag) return null;

    const childless = { tag, contentStart: tag.end, contentEnd: tag.end, end: tag.end };
    if (tag.selfClosing) return childless;

    const close = findClosingTag(source, tag.tagName, tag.end);
    if (!close) return childless;
    return { tag, contentStart: tag.end, contentEnd: close.start, end: close.end };
}

function findClosingTag(
    source: string,
    tagName: string,
    from: number,
): { start: number; end: number } | null {
    let depth = 1;
    let i = from;

    while (i < source.length) {
        const lt = source.indexOf('<', i);
        if (lt === -1) return null;

        CLOSING_TAG.lastIndex = lt;
        const closing = CLOSING_TAG.exec(source);
        if (closing) {
            const end = lt + closing[0].length;
            if (closing[1] === tagName && --depth === 0) {
                return { start: lt, end };
            }
            i = end;
            continue;
        }

        const nested = scanOpeningTag(source, lt);
        if (nested && nested.start === lt) {
            if (nested.tagName === tagName && !nested.selfClosing) depth++;
            i = nested.end;
            continue;
        }
        i = lt + 1;
    }
    return null;
}

// ── Parsing ────────────────────────────────────────────────────────────────────

/**
 * Parses the first top-level element of `source`.
 * Returns the empty shell (tagName null) when no tag is found.
 */
export function parseSnippet(source: string): ParsedNode {
    const element = findElement(source, 0);
    if (!element) return emptyNode();
    return buildNode(source, element);
}

function buildNode(source: string, element: ElementSpan): ParsedNode {
    const node: ParsedNode = {
        tagName: element.tag.tagName,
        attributes: {},
        innerText: '',
        children: [],
        rawStyleRules: {},
    };

    for (const { name, value, kind } of element.tag.attributes) {
        if (name === 'sx') {
            Object.assign(node.rawStyleRules, parseStyleObject(value));
        } else if (name === 'style') {
            const styles = kind === 'braced' && value.trim().startsWith('{')
                ? parseStyleObject(value)
                : parseInlineStyle(value);
            Object.assign(node.rawStyleRules, styles);
        } else {
            const lowered = value.trim().toLowerCase();
            node.attributes[name] = lowered === 'true' || lowered === 'false' ? lowered : value.trim();
        }
    }

    const inner = source.slice(element.contentStart, element.contentEnd).trim();
    if (!inner) return node;

    if (scanOpeningTag(inner, 0)) {
        node.children = parseChildren(inner);
    } else {
        node.innerText = inner;
    }
    return node;
}

/** Segments content into literal text children and parsed element children. */
function parseChildren(content: string): ParsedNode[] {
    const children: ParsedNode[] = [];
    let cursor = 0;
    let element = findElement(content, cursor);

    while (element) {
        const before = content.slice(cursor, element.tag.start).trim();
        if (before) children.push(textNode(before));
        children.push(buildNode(content, element));
        cursor = element.end;
        element = findElement(content, cursor);
    }

    const after = content.slice(cursor).trim();
    if (after) children.push(textNode(after));
    return children;
}

// ── Snippet extraction ─────────────────────────────────────────────────────────

/**
 * Splits the source text of a demo into its top-level element snippets.
 *
 * When `componentTag` is given, layout wrappers (`<Stack>`, `<Box>`, …) that
 * hold nested elements are replaced by their children, and leaf elements of
 * other components are skipped, so `<Stack><Button/><Button/></Stack>` yields
 * two Button snippets. If that filter finds nothing, every top-level element
 * is returned; if there are no elements at all, the trimmed code is.
 */
export function extractSnippets(code: string, componentTag?: string): string[] {
    const snippets: string[] = [];
    if (componentTag) collectSnippets(code, componentTag, snippets);
    if (snippets.length === 0) collectSnippets(code, undefined, snippets);
    if (snippets.length === 0 && code.trim()) snippets.push(code.trim());
    return snippets;
}

function collectSnippets(source: string, componentTag: string | undefined, out: string[]): void {
    let element = findElement(source, 0);
    while (element) {
        const isComponent = !componentTag || element.tag.tagName.endsWith(componentTag);
        if (isComponent) {
            out.push(source.slice(element.tag.start, element.end).trim());
        } else {
            const content = source.slice(element.contentStart, element.contentEnd);
            if (findElement(content, 0)) collectSnippets(content, componentTag, out);
        }
        element = findElement(source, element.end);
    }
}
