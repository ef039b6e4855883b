/**
 * Pairs parsed demo snippets with the elements a demo section rendered.
 *
 * Each snippet is matched with a cascade of heuristics, first non-empty step
 * wins and the first candidate in document order is taken:
 *
 *   1. text:       snippet inner text equals the element's text
 *   2. attributes: every structural attribute on the snippet agrees with the
 *                  properties inferred from the element's classes
 *   3. position:   the element at the snippet's own position
 *   4. first:      the first element still available
 *
 * With `exclusiveClaims` (the default) an element is claimed by the snippet it
 * matched and is skipped by every later step and snippet.
 */

import { inferProperties, getDefaultInferenceRules, type InferenceTable } from './inference.js';
import { TEXT_NODE, type ParsedNode, type RenderedElement, type Variation } from './types.js';

/** Snippet attributes compared against inferred properties in step 2. */
export const MATCH_ATTRIBUTES = ['variant', 'color', 'size', 'loading', 'loadingPosition'] as const;

export type MatchStrategy = 'text' | 'attributes' | 'position' | 'first';

export interface MatchResult {
    element: RenderedElement;
    /** Index of the element within the section */
    index: number;
    strategy: MatchStrategy;
}

export interface MatchOptions {
    /** Never hand the same element to two snippets (default true) */
    exclusiveClaims?: boolean;
    rules?: InferenceTable;
}

export class VariationMatcher {
    private readonly claimed = new Set<number>();
    private readonly exclusiveClaims: boolean;
    private readonly rules: InferenceTable;

    constructor(
        private readonly componentKind: string,
        private readonly elements: readonly RenderedElement[],
        options: MatchOptions = {},
    ) {
        this.exclusiveClaims = options.exclusiveClaims ?? true;
        this.rules = options.rules ?? getDefaultInferenceRules();
    }

    /**
     * Finds the rendered element for the snippet at `position` (document
     * order within the section). Returns null when nothing is left to match.
     */
    match(node: ParsedNode, position: number): MatchResult | null {
        const result = this.byText(node)
            ?? this.byAttributes(node)
            ?? this.byPosition(position)
            ?? this.first();
        if (result) this.claimed.add(result.index);
        return result;
    }

    /** Properties inferred from a rendered element's class names. */
    infer(element: RenderedElement): Record<string, string> {
        return inferProperties(this.componentKind, element.classNames, this.rules);
    }

    private available(index: number): boolean {
        return !this.exclusiveClaims || !this.claimed.has(index);
    }

    private find(strategy: MatchStrategy, test: (element: RenderedElement) => boolean): MatchResult | null {
        for (let index = 0; index < this.elements.length; index++) {
            const element = this.elements[index];
            if (this.available(index) && test(element)) {
                return { element, index, strategy };
            }
        }
        return null;
    }

    private byText(node: ParsedNode): MatchResult | null {
        const text = normaliseText(node.innerText);
        if (!text) return null;
        return this.find('text', element => element.text !== '' && element.text === text);
    }

    private byAttributes(node: ParsedNode): MatchResult | null {
        const wanted = MATCH_ATTRIBUTES.filter(key => key in node.attributes);
        if (wanted.length === 0) return null;
        return this.find('attributes', element => {
            const inferred = this.infer(element);
            return wanted.every(key => inferred[key] === node.attributes[key]);
        });
    }

    private byPosition(position: number): MatchResult | null {
        if (position < 0 || position >= this.elements.length || !this.available(position)) {
            return null;
        }
        return { element: this.elements[position], index: position, strategy: 'position' };
    }

    private first(): MatchResult | null {
        return this.find('first', () => true);
    }
}

/** Collapses whitespace runs the way rendered text is normalised. */
export function normaliseText(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

/**
 * Builds the variation record for a snippet. A missing match still yields a
 * variation, with empty class and property fields.
 */
export function buildVariation(
    name: string,
    rawSourceText: string,
    node: ParsedNode,
    match: MatchResult | null,
    matcher: VariationMatcher,
): Variation {
    return {
        name,
        rawSourceText,
        matchedClassNames: match ? [...match.element.classNames] : [],
        inferredProperties: match ? matcher.infer(match.element) : {},
        parsedNode: node,
    };
}

/** True for nodes that can stand for a variation (not the empty shell, not text). */
export function isElementNode(node: ParsedNode): boolean {
    return node.tagName !== null && node.tagName !== TEXT_NODE;
}
