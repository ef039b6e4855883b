/**
 * Opening-tag tokenizer for JSX demo snippets.
 *
 * Walks the source one character at a time through an explicit set of states
 * instead of matching the whole tag with one expression, so a `>` inside a
 * quoted or braced attribute value never ends the tag and brace nesting depth
 * is tracked exactly.
 *
 * The tokenizer never throws: unterminated tags and values run to the end of
 * the input and whatever was read so far is returned.
 */

export type AttributeValueKind = 'double' | 'single' | 'braced' | 'bare' | 'implicit';

export interface AttributeToken {
    name: string;
    /** Raw value: quotes and outer braces removed, nothing else touched */
    value: string;
    kind: AttributeValueKind;
}

export interface OpeningTag {
    tagName: string;
    attributes: AttributeToken[];
    selfClosing: boolean;
    /** Index of the `<` */
    start: number;
    /** Index just past the closing `>`, or the input length when unterminated */
    end: number;
}

type State =
    | 'outside-tag'
    | 'tag-name'
    | 'before-attribute-name'
    | 'attribute-name'
    | 'after-attribute-name'
    | 'before-attribute-value'
    | 'double-quoted'
    | 'single-quoted'
    | 'braced'
    | 'bare';

const NAME_START = /[A-Za-z_$]/;
const NAME_CHAR = /[\w$.-]/;
const ATTRIBUTE_NAME_CHAR = /[\w$.:-]/;
const WHITESPACE = /\s/;
const QUOTES = new Set(['"', "'", '`']);

// ── Tokenizer ──────────────────────────────────────────────────────────────────

/**
 * Finds the first opening tag at or after `from` and tokenizes it.
 * Returns null when the rest of the input holds no opening tag.
 */
export function scanOpeningTag(source: string, from: number = 0): OpeningTag | null {
    let state: State = 'outside-tag';
    let start = -1;
    let tagName = '';
    let name = '';
    let value = '';
    let depth = 0;
    let braceQuote: string | null = null;
    const attributes: AttributeToken[] = [];

    const push = (kind: AttributeValueKind): void => {
        // A braced value with no name is a spread (`{...props}`): skipped.
        if (name) {
            attributes.push({ name, value: kind === 'implicit' ? 'true' : value, kind });
        }
        name = '';
        value = '';
    };

    const finish = (end: number, selfClosing: boolean): OpeningTag => ({
        tagName,
        attributes,
        selfClosing,
        start,
        end,
    });

    for (let i = from; i < source.length; i++) {
        const ch = source[i];

        switch (state) {
            case 'outside-tag': {
                if (ch !== '<') break;
                let j = i + 1;
                while (j < source.length && WHITESPACE.test(source[j])) j++;
                if (j < source.length && NAME_START.test(source[j])) {
                    start = i;
                    state = 'tag-name';
                    i = j - 1;
                }
                break;
            }

            case 'tag-name':
                if (NAME_CHAR.test(ch)) {
                    tagName += ch;
                } else {
                    state = 'before-attribute-name';
                    i--;
                }
                break;

            case 'before-attribute-name':
                if (ch === '>') return finish(i + 1, false);
                if (ch === '/' && source[i + 1] === '>') return finish(i + 2, true);
                if (ch === '{') {
                    depth = 1;
                    state = 'braced';
                } else if (ATTRIBUTE_NAME_CHAR.test(ch)) {
                    name = ch;
                    state = 'attribute-name';
                }
                break;

            case 'attribute-name':
                if (ATTRIBUTE_NAME_CHAR.test(ch)) {
                    name += ch;
                } else if (ch === '=') {
                    state = 'before-attribute-value';
                } else if (WHITESPACE.test(ch)) {
                    state = 'after-attribute-name';
                } else {
                    push('implicit');
                    state = 'before-attribute-name';
                    i--;
                }
                break;

            case 'after-attribute-name':
                if (WHITESPACE.test(ch)) break;
                if (ch === '=') {
                    state = 'before-attribute-value';
                } else {
                    push('implicit');
                    state = 'before-attribute-name';
                    i--;
                }
                break;

            case 'before-attribute-value':
                if (WHITESPACE.test(ch)) break;
                if (ch === '"') {
                    state = 'double-quoted';
                } else if (ch === "'") {
                    state = 'single-quoted';
                } else if (ch === '{') {
                    depth = 1;
                    state = 'braced';
                } else if (ch === '>') {
                    push('bare');
                    state = 'before-attribute-name';
                    i--;
                } else {
                    value = ch;
                    state = 'bare';
                }
                break;

            case 'double-quoted':
            case 'single-quoted':
                if (ch === (state === 'double-quoted' ? '"' : "'")) {
                    push(state === 'double-quoted' ? 'double' : 'single');
                    state = 'before-attribute-name';
                } else {
                    value += ch;
                }
                break;

            case 'braced':
                if (braceQuote) {
                    value += ch;
                    if (ch === '\\' && i + 1 < source.length) {
                        value += source[++i];
                    } else if (ch === braceQuote) {
                        braceQuote = null;
                    }
                } else if (QUOTES.has(ch)) {
                    braceQuote = ch;
                    value += ch;
                } else if (ch === '{') {
                    depth++;
                    value += ch;
                } else if (ch === '}') {
                    depth--;
                    if (depth === 0) {
                        push('braced');
                        state = 'before-attribute-name';
                    } else {
                        value += ch;
                    }
                } else {
                    value += ch;
                }
                break;

            case 'bare':
                if (WHITESPACE.test(ch)) {
                    push('bare');
                    state = 'before-attribute-name';
                } else if (ch === '>' || (ch === '/' && source[i + 1] === '>')) {
                    push('bare');
                    state = 'before-attribute-name';
                    i--;
                } else {
                    value += ch;
                }
                break;
        }
    }

    // Ran off the end of the input
    switch (state) {
        case 'outside-tag':
            return null;
        case 'attribute-name':
        case 'after-attribute-name':
            push('implicit');
            break;
        case 'double-quoted':
            push('double');
            break;
        case 'single-quoted':
            push('single');
            break;
        case 'braced':
            push('braced');
            break;
        case 'bare':
        case 'before-attribute-value':
            push('bare');
            break;
        default:
            break;
    }
    return finish(source.length, false);
}

// ── Style values ───────────────────────────────────────────────────────────────

/**
 * Reads a flat object literal such as `{ color: 'red', mb: 2 }` into
 * key/value pairs.
 *
 * Only `key: value` pairs with a plain key and a scalar value are kept.
 * Values holding nested objects, arrays, calls or arrow functions are dropped
 * for that key; so are quoted keys (`'&:hover'`).
 */
export function parseStyleObject(raw: string): Record<string, string> {
    const styles: Record<string, string> = {};
    const trimmed = raw.trim();
    if (!trimmed.startsWith('{')) return styles;

    const body = trimmed.endsWith('}') ? trimmed.slice(1, -1) : trimmed.slice(1);
    for (const pair of splitTopLevelPairs(body)) {
        const match = /^\s*([A-Za-z0-9$_-]+)\s*:\s*([\s\S]*?)\s*$/.exec(pair);
        if (!match) continue;
        const value = scalarValue(match[2]);
        if (value !== null) styles[match[1]] = value;
    }
    return styles;
}

/** Splits `color: red; margin: 4px` on `;`, then on the first `:`. */
export function parseInlineStyle(raw: string): Record<string, string> {
    const styles: Record<string, string> = {};
    for (const pair of raw.trim().split(';')) {
        const colon = pair.indexOf(':');
        if (colon === -1) continue;
        const key = pair.slice(0, colon).trim();
        if (key) styles[key] = pair.slice(colon + 1).trim();
    }
    return styles;
}

/** Splits an object body on `,` and newlines that sit outside quotes and brackets. */
function splitTopLevelPairs(body: string): string[] {
    const pairs: string[] = [];
    let current = '';
    let depth = 0;
    let quote: string | null = null;

    for (let i = 0; i < body.length; i++) {
        const ch = body[i];
        if (quote) {
            current += ch;
            if (ch === '\\' && i + 1 < body.length) {
                current += body[++i];
            } else if (ch === quote) {
                quote = null;
            }
            continue;
        }
        if (QUOTES.has(ch)) {
            quote = ch;
        } else if (ch === '{' || ch === '[' || ch === '(') {
            depth++;
        } else if (ch === '}' || ch === ']' || ch === ')') {
            depth = Math.max(0, depth - 1);
        } else if (depth === 0 && (ch === ',' || ch === '\n')) {
            pairs.push(current);
            current = '';
            continue;
        }
        current += ch;
    }
    pairs.push(current);
    return pairs.filter(p => p.trim().length > 0);
}

function scalarValue(raw: string): string | null {
    const quoted = /^(['"`])([\s\S]*)\1$/.exec(raw);
    if (quoted) return quoted[2];
    if (!raw || /[{}[\]()]|=>/.test(raw)) return null;
    return raw;
}
