/**
 * Reading and writing the intermediate `<component>_full_details.json` file.
 *
 * Loading is lenient: missing or mistyped fields fall back to empty values,
 * numbers and booleans in text fields become strings, and unknown fields are
 * ignored. Only text that is not a JSON object is rejected.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { emptyNode, type ComponentDefinition, type ParsedNode } from './types.js';

const text = z
    .union([z.string(), z.number(), z.boolean()])
    .transform(value => String(value))
    .catch('');

const textRecord = z.record(text).catch({});
const textList = z.array(text).catch([]);

const ParsedNodeSchema: z.ZodType<ParsedNode, z.ZodTypeDef, unknown> = z.lazy(() =>
    z.object({
        tagName: z.string().nullable().catch(null),
        attributes: textRecord,
        innerText: text,
        children: z.array(ParsedNodeSchema).catch([]),
        rawStyleRules: textRecord,
    }),
);

const VariationSchema = z.object({
    name: text,
    rawSourceText: text,
    matchedClassNames: textList,
    inferredProperties: textRecord,
    parsedNode: ParsedNodeSchema.catch(() => emptyNode()),
});

const DocSchema = z.object({
    type: text,
    default: text,
    description: text,
});

const CssClassSchema = z.object({
    className: text,
    ruleName: text,
    description: text,
});

export const ComponentDefinitionSchema = z.object({
    name: text,
    properties: z.record(DocSchema).catch({}),
    cssClasses: z.array(CssClassSchema).catch([]),
    variations: z.array(VariationSchema).catch([]),
});

/** `Button` → `button_full_details.json` */
export function definitionFileName(component: string): string {
    return `${component.toLowerCase()}_full_details.json`;
}

export function serializeDefinition(definition: ComponentDefinition): string {
    return JSON.stringify(definition, null, 2);
}

export function parseDefinition(json: string): ComponentDefinition {
    return ComponentDefinitionSchema.parse(JSON.parse(json));
}

/** Writes the definition into `dir` and returns the file path. */
export function saveDefinition(dir: string, definition: ComponentDefinition): string {
    const filePath = path.join(dir, definitionFileName(definition.name));
    fs.writeFileSync(filePath, serializeDefinition(definition) + '\n', 'utf-8');
    return filePath;
}

/**
 * Returns null when the component has no definition file in `dir`. A document
 * without a name takes `component` as its name.
 */
export function loadDefinition(dir: string, component: string): ComponentDefinition | null {
    const filePath = path.join(dir, definitionFileName(component));
    if (!fs.existsSync(filePath)) return null;
    const definition = parseDefinition(fs.readFileSync(filePath, 'utf-8'));
    return definition.name ? definition : { ...definition, name: component };
}
