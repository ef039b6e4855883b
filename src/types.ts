/**
 * Shapes of the intermediate component representation.
 *
 * A ComponentDefinition is the root aggregate written to
 * `<component>_full_details.json` by the scraper and read back by every
 * generator stage.
 */

/** Tag name carried by literal text children. */
export const TEXT_NODE = '#text';

export interface ParsedNode {
    /** Element tag, `#text` for literal text children, `null` when no tag was found */
    tagName: string | null;
    /** Source attributes in document order (`sx` and `style` are moved to rawStyleRules) */
    attributes: Record<string, string>;
    innerText: string;
    children: ParsedNode[];
    /** Flat CSS-like rules pulled from `sx` / `style` */
    rawStyleRules: Record<string, string>;
}

export interface Variation {
    name: string;
    rawSourceText: string;
    /** Class names of the rendered element this snippet was paired with */
    matchedClassNames: string[];
    inferredProperties: Record<string, string>;
    parsedNode: ParsedNode;
}

export interface PropertyDoc {
    type: string;
    default: string;
    description: string;
}

export interface CssClassDoc {
    className: string;
    ruleName: string;
    description: string;
}

export interface ComponentDefinition {
    name: string;
    properties: Record<string, PropertyDoc>;
    cssClasses: CssClassDoc[];
    variations: Variation[];
}

/** DOM-free view of an element rendered by a demo. */
export interface RenderedElement {
    classNames: string[];
    /** Text content, whitespace runs collapsed and trimmed */
    text: string;
}

export function emptyNode(): ParsedNode {
    return { tagName: null, attributes: {}, innerText: '', children: [], rawStyleRules: {} };
}

export function textNode(text: string): ParsedNode {
    return { tagName: TEXT_NODE, attributes: {}, innerText: text, children: [], rawStyleRules: {} };
}
