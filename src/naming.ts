import type { ParsedNode, Variation } from './types.js';

/** Attributes that make it into a variation name, in this order. */
const NAME_ATTRIBUTES = ['variant', 'color', 'size', 'loading', 'loadingPosition'];

/**
 * Builds a descriptive variation name: `<Tag>-<Text>_<key-value…>[_<n>]`,
 * e.g. `Button-Contained_variant-contained`. The snippet index is appended
 * when a demo section holds more than one snippet.
 */
export function variationName(
    node: ParsedNode,
    snippetIndex: number,
    snippetCount: number,
    sectionIndex: number,
): string {
    const tag = node.tagName ?? '';
    let text = node.innerText.trim();
    if (!text) text = tag === 'IconButton' ? 'Icon' : tag;

    const props = NAME_ATTRIBUTES
        .filter(key => key in node.attributes)
        .map(key => `${key}-${node.attributes[key]}`);

    let name = `${tag}-${text.replace(/\s+/g, '')}${props.length > 0 ? '_' + props.join('_') : ''}`;
    if (snippetCount > 1) name += `_${snippetIndex + 1}`;

    name = name.replace(/__/g, '_').replace(/^_+|_+$/g, '');
    return name || `Unnamed-${tag}-Demo-${sectionIndex + 1}-${snippetIndex + 1}`;
}

/** Name for a variation taken from a rendered element with no source code. */
export function renderedOnlyName(
    component: string,
    text: string,
    sectionIndex: number,
    elementIndex: number,
): string {
    const label = text || `${component} Demo ${sectionIndex + 1}-${elementIndex + 1}`;
    return `${component}-${label.replace(/\s+/g, '')}_RenderedOnly_${sectionIndex + 1}-${elementIndex + 1}`;
}

/**
 * Appends `-2`, `-3`, … to names that repeat within one definition. Names that
 * differ only in case count as repeats, since file names are lower-cased.
 */
export function ensureUniqueNames(variations: readonly Variation[]): Variation[] {
    const taken = new Set<string>();
    return variations.map(variation => {
        let name = variation.name;
        for (let n = 2; taken.has(name.toLowerCase()); n++) {
            name = `${variation.name}-${n}`;
        }
        taken.add(name.toLowerCase());
        return name === variation.name ? variation : { ...variation, name };
    });
}

/** `loadingPosition` → `LoadingPosition`, `aria-label` → `AriaLabel` */
export function toPascalCase(name: string): string {
    return name
        .split(/[^A-Za-z0-9]+/)
        .filter(Boolean)
        .map(word => word[0].toUpperCase() + word.slice(1))
        .join('');
}

/** `loadingPosition` → `loading-position` */
export function toKebabCase(name: string): string {
    return name
        .replace(/[A-Z]/g, c => '-' + c.toLowerCase())
        .replace(/^-+|-+$/g, '');
}

/** `toCamelCase('LoadingPosition')` → `loadingPosition` */
export function toCamelCase(name: string): string {
    const pascal = toPascalCase(name);
    return pascal ? pascal[0].toLowerCase() + pascal.slice(1) : pascal;
}
