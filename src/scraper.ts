import { JSDOM } from 'jsdom';
import TurndownService from 'turndown';
import type { DocsClient } from './client.js';
import { inferProperties, getDefaultInferenceRules, type InferenceTable } from './inference.js';
import { VariationMatcher, buildVariation, isElementNode } from './matcher.js';
import { ensureUniqueNames, renderedOnlyName, variationName } from './naming.js';
import { MUI_PROFILE, resolveTemplate, type DocsSiteProfile } from './profiles.js';
import { extractSnippets, parseSnippet } from './snippet.js';
import type {
    ComponentDefinition,
    CssClassDoc,
    PropertyDoc,
    RenderedElement,
    Variation,
} from './types.js';

const turndownService = new TurndownService({
    headingStyle: 'atx',
    codeBlockStyle: 'fenced',
    bulletListMarker: '-',
});

export interface ApiReference {
    name: string;
    properties: Record<string, PropertyDoc>;
    cssClasses: CssClassDoc[];
}

export interface ScrapeOptions {
    profile?: DocsSiteProfile;
    rules?: InferenceTable;
    /** See MatchOptions.exclusiveClaims */
    exclusiveClaims?: boolean;
}

// ── DOM helpers ────────────────────────────────────────────────────────────────

/** Text content with whitespace runs collapsed. */
export function flattenText(el: Element): string {
    return (el.textContent ?? '').replace(/\s+/g, ' ').trim();
}

function toMarkdown(el: Element): string {
    return turndownService.turndown(el.innerHTML).trim();
}

export function toRenderedElement(el: Element): RenderedElement {
    return { classNames: Array.from(el.classList), text: flattenText(el) };
}

function log(message: string): void {
    process.stderr.write(`[scraper] ${message}\n`);
}

// ── API reference page ─────────────────────────────────────────────────────────

/**
 * Reads the component name, the props table and the CSS classes table from an
 * API reference page. Missing tables degrade to empty results.
 */
export function extractApiReference(
    document: Document,
    component: string,
    profile: DocsSiteProfile = MUI_PROFILE,
): ApiReference {
    let name = component;
    const title = document.querySelector('h1');
    const titleText = title ? flattenText(title) : '';
    if (titleText.includes(profile.api_title_suffix)) {
        name = titleText.replace(profile.api_title_suffix, '').trim();
    }

    const rows = Array.from(document.querySelectorAll('tr'));

    // ── Props ───────────────────────────────────────────────────────────────
    const properties: Record<string, PropertyDoc> = {};
    const propPrefix = resolveTemplate(profile.prop_row_prefix_template, name);
    const propRows = rows.filter(row => row.id.startsWith(propPrefix));
    for (const row of propRows) {
        const cells = Array.from(row.querySelectorAll('th, td'));
        if (cells.length < 4) {
            log(`Skipping malformed prop row (not enough columns): ${flattenText(row)}`);
            continue;
        }
        properties[row.id.slice(propPrefix.length)] = {
            type: flattenText(cells[1]),
            default: flattenText(cells[2]),
            description: toMarkdown(cells[3]),
        };
    }
    if (propRows.length === 0) {
        log(`No prop rows with id prefix '${propPrefix}' found`);
    }

    // ── CSS classes ─────────────────────────────────────────────────────────
    const cssClasses: CssClassDoc[] = [];
    const classPrefix = resolveTemplate(profile.class_row_prefix_template, name);
    const classRows = rows.filter(row => row.id.startsWith(classPrefix));
    for (const row of classRows) {
        const cells = Array.from(row.querySelectorAll('td'));
        if (cells.length < 3) {
            log(`Skipping malformed CSS class row (not enough columns): ${flattenText(row)}`);
            continue;
        }
        const ruleSpan = cells[1].querySelector('span');
        cssClasses.push({
            className: flattenText(cells[0]),
            ruleName: ruleSpan ? flattenText(ruleSpan) : '',
            description: toMarkdown(cells[2]),
        });
    }
    if (classRows.length === 0) {
        log(`No CSS class rows with id prefix '${classPrefix}' found`);
    }

    log(`${name}: ${Object.keys(properties).length} props, ${cssClasses.length} CSS classes`);
    return { name, properties, cssClasses };
}

// ── Demo page ──────────────────────────────────────────────────────────────────

/**
 * Builds one variation per JSX snippet found in the page's demo sections,
 * each paired with the rendered element it most likely produced. Sections
 * without source code yield one variation per rendered element instead.
 */
export function extractDemoVariations(
    document: Document,
    component: string,
    options: ScrapeOptions = {},
): Variation[] {
    const profile = options.profile ?? MUI_PROFILE;
    const rules = options.rules ?? getDefaultInferenceRules();
    const sections = Array.from(document.querySelectorAll(profile.demo_section_selector));
    if (sections.length === 0) {
        log(`No demo sections matching '${profile.demo_section_selector}' found`);
        return [];
    }
    log(`Found ${sections.length} demo sections`);

    const rootClass = resolveTemplate(profile.root_class_template, component);
    const variations: Variation[] = [];

    sections.forEach((section, i) => {
        const rendered = Array.from(section.getElementsByClassName(rootClass)).map(toRenderedElement);
        const code = section.querySelector(profile.code_selector);

        if (!code) {
            log(`No source code in demo section ${i + 1}, using rendered elements only`);
            rendered.forEach((element, k) => {
                variations.push({
                    name: renderedOnlyName(component, element.text, i, k),
                    rawSourceText: '',
                    matchedClassNames: [...element.classNames],
                    inferredProperties: inferProperties(component, element.classNames, rules),
                    parsedNode: {
                        tagName: component,
                        attributes: {},
                        innerText: element.text || `${component} Demo ${i + 1}-${k + 1}`,
                        children: [],
                        rawStyleRules: {},
                    },
                });
            });
            return;
        }

        const snippets = extractSnippets(code.textContent ?? '', component);
        const matcher = new VariationMatcher(component, rendered, {
            rules,
            exclusiveClaims: options.exclusiveClaims,
        });

        snippets.forEach((snippet, j) => {
            const node = parseSnippet(snippet);
            if (!isElementNode(node)) {
                log(`No tag found in snippet ${j + 1} of demo section ${i + 1}, skipped`);
                return;
            }
            const match = matcher.match(node, j);
            if (!match) {
                process.stderr.write(
                    `[matcher] Warning: no rendered element for snippet ${j + 1} in demo section ${i + 1}; ` +
                    `matched classes and inferred properties left empty\n`,
                );
            }
            variations.push(buildVariation(variationName(node, j, snippets.length, i), snippet, node, match, matcher));
        });
    });

    return ensureUniqueNames(variations);
}

// ── Orchestration ──────────────────────────────────────────────────────────────

/**
 * Scrapes the API page and the demo page of a component.
 *
 * Returns null when the API page cannot be fetched. A demo page that cannot be
 * fetched leaves the definition without variations.
 */
export async function scrapeComponent(
    client: DocsClient,
    component: string,
    options: ScrapeOptions = {},
): Promise<ComponentDefinition | null> {
    const profile = options.profile ?? MUI_PROFILE;
    const apiUrl = resolveTemplate(profile.api_url_template, component);
    log(`Scraping API page: ${apiUrl}`);

    let apiHtml: string;
    try {
        apiHtml = await client.fetchHtml(apiUrl);
    } catch (err) {
        log(`Error fetching API page ${apiUrl}: ${err instanceof Error ? err.message : String(err)}`);
        return null;
    }

    const apiDom = new JSDOM(apiHtml, { url: apiUrl });
    const api = extractApiReference(apiDom.window.document, component, profile);
    apiDom.window.close();

    const demoUrl = resolveTemplate(profile.demo_url_template, api.name);
    log(`Scraping demo page: ${demoUrl}`);

    let variations: Variation[] = [];
    let demoHtml: string | null = null;
    try {
        demoHtml = await client.fetchHtml(demoUrl);
    } catch (err) {
        log(`Error fetching demo page ${demoUrl}: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (demoHtml !== null) {
        const demoDom = new JSDOM(demoHtml, { url: demoUrl });
        variations = extractDemoVariations(demoDom.window.document, api.name, { ...options, profile });
        demoDom.window.close();
    }

    return {
        name: api.name,
        properties: api.properties,
        cssClasses: api.cssClasses,
        variations,
    };
}
