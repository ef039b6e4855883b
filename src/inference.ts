/**
 * Class-name → property inference.
 *
 * Rendered demo elements only tell us their CSS classes. A rule table keyed by
 * component kind (lower-cased component name) maps class-name substrings to
 * canonical property values: `MuiButton-outlined` → `variant: outlined`.
 *
 * The bundled table lives in data/inference-rules.json. Operators add kinds or
 * override rules by merging another JSON file of the same shape.
 */

import fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const InferenceRuleSchema = z.object({
    /** Substring looked for in each class name */
    match: z.string().min(1),
    property: z.string().min(1),
    value: z.string(),
});

const KindRulesSchema = z.object({
    /** Values used when no rule for the property matched */
    defaults: z.record(z.string()).default({}),
    /** Ordered: for each property the first matching rule wins */
    rules: z.array(InferenceRuleSchema).default([]),
});

export const InferenceTableSchema = z.record(KindRulesSchema);

export type KindRules = z.infer<typeof KindRulesSchema>;
export type InferenceTable = Record<string, KindRules>;

export const DEFAULT_RULES_PATH = fileURLToPath(new URL('../data/inference-rules.json', import.meta.url));

let defaultTable: InferenceTable | null = null;

/** Reads and normalises a rule table (kind keys are lower-cased). */
export function loadInferenceRules(filePath: string = DEFAULT_RULES_PATH): InferenceTable {
    const parsed = InferenceTableSchema.parse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
    const table: InferenceTable = {};
    for (const [kind, rules] of Object.entries(parsed)) {
        table[kind.toLowerCase()] = rules;
    }
    return table;
}

export function getDefaultInferenceRules(): InferenceTable {
    defaultTable ??= loadInferenceRules();
    return defaultTable;
}

/**
 * Layers `extra` over `base`. Rules from `extra` are tried first and its
 * defaults win; kinds only present in one table are copied as they are.
 */
export function mergeInferenceRules(base: InferenceTable, extra: InferenceTable): InferenceTable {
    const merged: InferenceTable = { ...base };
    for (const [rawKind, rules] of Object.entries(extra)) {
        const kind = rawKind.toLowerCase();
        const existing = merged[kind];
        merged[kind] = existing
            ? {
                defaults: { ...existing.defaults, ...rules.defaults },
                rules: [...rules.rules, ...existing.rules],
            }
            : rules;
    }
    return merged;
}

/**
 * Infers component properties from a rendered element's class names.
 * Unknown kinds give an empty object.
 */
export function inferProperties(
    kind: string,
    classNames: readonly string[],
    table: InferenceTable = getDefaultInferenceRules(),
): Record<string, string> {
    const kindRules = table[kind.toLowerCase()];
    if (!kindRules) return {};

    const inferred: Record<string, string> = {};
    for (const rule of kindRules.rules) {
        if (rule.property in inferred) continue;
        if (classNames.some(name => name.includes(rule.match))) {
            inferred[rule.property] = rule.value;
        }
    }
    for (const [property, value] of Object.entries(kindRules.defaults)) {
        if (!(property in inferred)) inferred[property] = value;
    }
    return inferred;
}
