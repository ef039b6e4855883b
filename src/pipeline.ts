/**
 * The four pipeline stages. Each stage works inside a working directory:
 * `scrape` writes `<component>_full_details.json` there and the generators read
 * it back and write into GeneratedCSharp/, GeneratedUXML/ and GeneratedUSS/.
 */

import fs from 'fs';
import path from 'path';
import { DocsClient } from './client.js';
import { definitionFileName, loadDefinition, saveDefinition, serializeDefinition } from './definition.js';
import { generateCSharp } from './generators/csharp.js';
import { generateUss, ussFileName } from './generators/uss.js';
import { generateUxml } from './generators/uxml.js';
import {
    getDefaultInferenceRules,
    loadInferenceRules,
    mergeInferenceRules,
    type InferenceTable,
} from './inference.js';
import { scrapeComponent } from './scraper.js';
import type { ComponentDefinition } from './types.js';

export const STAGES = ['scrape', 'csharp', 'uxml', 'uss'] as const;
export type StageName = (typeof STAGES)[number];

export const CSHARP_DIR = 'GeneratedCSharp';
export const UXML_DIR = 'GeneratedUXML';
export const USS_DIR = 'GeneratedUSS';

export interface PipelineOptions {
    /** Working directory, defaults to process.cwd() */
    dir?: string;
    /** Extra inference rules merged over the bundled table */
    rulesFile?: string;
    /** See MatchOptions.exclusiveClaims */
    exclusiveClaims?: boolean;
    respectRobots?: boolean;
    /** Client used by `scrape`; one is created and closed per run otherwise */
    client?: DocsClient;
}

export type StageStatus = 'ok' | 'missing' | 'failed';

export interface StageResult {
    stage: StageName;
    status: StageStatus;
    /** Files written by the stage */
    files: string[];
    /** Generated content, printed by the CLI */
    output: string;
}

function log(message: string): void {
    process.stderr.write(`[pipeline] ${message}\n`);
}

function workingDir(options: PipelineOptions): string {
    return options.dir ?? process.cwd();
}

export function resolveRules(rulesFile?: string): InferenceTable {
    const base = getDefaultInferenceRules();
    return rulesFile ? mergeInferenceRules(base, loadInferenceRules(rulesFile)) : base;
}

/** Writes an artifact, reporting a failure instead of throwing. */
function writeArtifact(filePath: string, content: string, files: string[]): void {
    try {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(filePath, content, 'utf-8');
        files.push(filePath);
        log(`Wrote ${filePath}`);
    } catch (err) {
        log(`Error saving ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    }
}

/** Loads the definition a generator needs, logging when it is missing. */
function requireDefinition(stage: StageName, component: string, dir: string): ComponentDefinition | null {
    const definition = loadDefinition(dir, component);
    if (!definition) {
        log(
            `Error: JSON file '${definitionFileName(component)}' not found in ${dir}. ` +
            `Run the scrape stage for '${component}' first.`,
        );
        return null;
    }
    log(`${stage}: loaded ${definition.name} (${definition.variations.length} variations)`);
    return definition;
}

// ── Stages ─────────────────────────────────────────────────────────────────────

export async function runScrape(component: string, options: PipelineOptions = {}): Promise<StageResult> {
    const dir = workingDir(options);
    const client = options.client ?? new DocsClient({ respectRobots: options.respectRobots });
    let definition: ComponentDefinition | null;
    try {
        definition = await scrapeComponent(client, component, {
            rules: resolveRules(options.rulesFile),
            exclusiveClaims: options.exclusiveClaims,
        });
    } finally {
        if (!options.client) client.close();
    }

    if (!definition) {
        log(`Scraping '${component}' failed, no definition written`);
        return { stage: 'scrape', status: 'failed', files: [], output: '' };
    }

    try {
        fs.mkdirSync(dir, { recursive: true });
        const filePath = saveDefinition(dir, definition);
        log(`Saved scraped data to ${filePath}`);
        return { stage: 'scrape', status: 'ok', files: [filePath], output: serializeDefinition(definition) };
    } catch (err) {
        log(`Error saving definition for '${component}': ${err instanceof Error ? err.message : String(err)}`);
        return { stage: 'scrape', status: 'failed', files: [], output: serializeDefinition(definition) };
    }
}

export function runCSharp(component: string, options: PipelineOptions = {}): StageResult {
    const dir = workingDir(options);
    const definition = requireDefinition('csharp', component, dir);
    if (!definition) return { stage: 'csharp', status: 'missing', files: [], output: '' };

    const code = generateCSharp(definition);
    const files: string[] = [];
    writeArtifact(path.join(dir, CSHARP_DIR, `Mui${definition.name}.cs`), code, files);
    return { stage: 'csharp', status: 'ok', files, output: code };
}

export function runUxml(component: string, options: PipelineOptions = {}): StageResult {
    const dir = workingDir(options);
    const definition = requireDefinition('uxml', component, dir);
    if (!definition) return { stage: 'uxml', status: 'missing', files: [], output: '' };

    const { documents, skipped } = generateUxml(definition);
    for (const name of skipped) {
        log(`Skipping UXML for '${name}': its snippet has no element`);
    }
    const files: string[] = [];
    for (const doc of documents) {
        writeArtifact(path.join(dir, UXML_DIR, doc.fileName), doc.content, files);
    }
    return {
        stage: 'uxml',
        status: 'ok',
        files,
        output: documents.map(doc => `<!-- ${doc.fileName} -->\n${doc.content}`).join('\n'),
    };
}

export function runUss(component: string, options: PipelineOptions = {}): StageResult {
    const dir = workingDir(options);
    const definition = requireDefinition('uss', component, dir);
    if (!definition) return { stage: 'uss', status: 'missing', files: [], output: '' };

    const uss = generateUss(definition);
    const files: string[] = [];
    writeArtifact(path.join(dir, USS_DIR, ussFileName(definition.name)), uss, files);
    return { stage: 'uss', status: 'ok', files, output: uss };
}

/** Runs every stage in order, stopping when scraping fails. */
export async function runAll(component: string, options: PipelineOptions = {}): Promise<StageResult[]> {
    const scraped = await runScrape(component, options);
    if (scraped.status !== 'ok') return [scraped];
    return [
        scraped,
        runCSharp(component, options),
        runUxml(component, options),
        runUss(component, options),
    ];
}

export async function runStage(stage: StageName, component: string, options: PipelineOptions = {}): Promise<StageResult> {
    switch (stage) {
        case 'scrape':
            return runScrape(component, options);
        case 'csharp':
            return runCSharp(component, options);
        case 'uxml':
            return runUxml(component, options);
        case 'uss':
            return runUss(component, options);
    }
}
