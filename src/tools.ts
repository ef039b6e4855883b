/**
 * MCP tool definitions and their handlers. Arguments arrive as untyped JSON and
 * are parsed with zod before use.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { DocsClient } from './client.js';
import { loadDefinition, saveDefinition, serializeDefinition } from './definition.js';
import { generateCSharp } from './generators/csharp.js';
import { generateUss } from './generators/uss.js';
import { generateUxml } from './generators/uxml.js';
import { resolveRules } from './pipeline.js';
import { scrapeComponent } from './scraper.js';
import { extractSnippets, parseSnippet } from './snippet.js';
import type { ComponentDefinition } from './types.js';

export type ToolResult = {
    content: Array<{ type: 'text'; text: string }>;
    isError?: boolean;
};

const ScrapeArgs = z.object({
    component: z.string().min(1),
    save_dir: z.string().optional(),
    allow_reuse: z.boolean().default(false),
    respect_robots: z.boolean().default(true),
});

const ParseSnippetArgs = z.object({
    code: z.string(),
    component: z.string().optional(),
});

const DefinitionArgs = z.object({
    component: z.string().min(1),
    dir: z.string().default('.'),
});

const componentProperty = { type: 'string', description: "Component name, e.g. 'Button'" };
const dirProperty = {
    type: 'string',
    description: 'Directory holding <component>_full_details.json. Defaults to the server working directory.',
};

export const TOOL_DEFINITIONS: Tool[] = [
    {
        name: 'scrape_component',
        description: [
            'Fetches the API reference and demo pages of a component and returns its definition as JSON:',
            'props, CSS classes and one variation per demo snippet, each paired with the rendered element',
            'and the properties inferred from its classes. Respects robots.txt and crawl-delay.',
        ].join(' '),
        inputSchema: {
            type: 'object',
            properties: {
                component: componentProperty,
                save_dir: { type: 'string', description: 'When set, also writes <component>_full_details.json there.' },
                allow_reuse: {
                    type: 'boolean',
                    description: 'Let one rendered element match several snippets. Defaults to false.',
                    default: false,
                },
                respect_robots: { type: 'boolean', default: true },
            },
            required: ['component'],
        },
    },
    {
        name: 'parse_snippet',
        description: 'Splits JSX demo code into component snippets and returns the parsed element tree of each.',
        inputSchema: {
            type: 'object',
            properties: {
                code: { type: 'string' },
                component: { type: 'string', description: 'Only keep snippets whose tag ends with this name.' },
            },
            required: ['code'],
        },
    },
    {
        name: 'get_component_definition',
        description: 'Returns a previously scraped component definition.',
        inputSchema: {
            type: 'object',
            properties: { component: componentProperty, dir: dirProperty },
            required: ['component'],
        },
    },
    {
        name: 'generate_csharp',
        description: 'Generates the Unity UI Toolkit C# element class for a scraped component.',
        inputSchema: {
            type: 'object',
            properties: { component: componentProperty, dir: dirProperty },
            required: ['component'],
        },
    },
    {
        name: 'generate_uxml',
        description: 'Generates one UXML document per variation of a scraped component.',
        inputSchema: {
            type: 'object',
            properties: { component: componentProperty, dir: dirProperty },
            required: ['component'],
        },
    },
    {
        name: 'generate_uss',
        description: 'Generates the USS stylesheet for a scraped component.',
        inputSchema: {
            type: 'object',
            properties: { component: componentProperty, dir: dirProperty },
            required: ['component'],
        },
    },
];

function text(value: string): ToolResult {
    return { content: [{ type: 'text', text: value }] };
}

function requireDefinition(args: unknown): ComponentDefinition {
    const { component, dir } = DefinitionArgs.parse(args);
    const definition = loadDefinition(dir, component);
    if (!definition) {
        throw new Error(`No definition for '${component}' in ${dir}. Run scrape_component with save_dir first.`);
    }
    return definition;
}

// ── Tool execution ─────────────────────────────────────────────────────────────

export async function callTool(name: string, args: unknown): Promise<ToolResult> {
    try {
        switch (name) {
            case 'scrape_component': {
                const { component, save_dir, allow_reuse, respect_robots } = ScrapeArgs.parse(args);
                const client = new DocsClient({ respectRobots: respect_robots });
                let definition: ComponentDefinition | null;
                try {
                    definition = await scrapeComponent(client, component, {
                        rules: resolveRules(),
                        exclusiveClaims: !allow_reuse,
                    });
                } finally {
                    client.close();
                }
                if (!definition) throw new Error(`Could not scrape the API page of '${component}'`);
                if (save_dir) saveDefinition(save_dir, definition);
                return text(serializeDefinition(definition));
            }

            case 'parse_snippet': {
                const { code, component } = ParseSnippetArgs.parse(args);
                const nodes = extractSnippets(code, component).map(parseSnippet);
                return text(JSON.stringify(nodes, null, 2));
            }

            case 'get_component_definition':
                return text(serializeDefinition(requireDefinition(args)));

            case 'generate_csharp':
                return text(generateCSharp(requireDefinition(args)));

            case 'generate_uxml': {
                const { documents } = generateUxml(requireDefinition(args));
                return text(JSON.stringify(documents, null, 2));
            }

            case 'generate_uss':
                return text(generateUss(requireDefinition(args)));

            default:
                throw new Error(`Tool not found: ${name}`);
        }
    } catch (err: unknown) {
        const errorMessage = err instanceof Error ? err.message : String(err);
        return {
            content: [{ type: 'text', text: `Error: ${errorMessage}` }],
            isError: true,
        };
    }
}
