/**
 * USS generator: a stylesheet per component with theme variables, a base rule
 * for the root class and one rule (plus `:hover` / `:active`) per variation.
 */

import type { ComponentDefinition, Variation } from '../types.js';

interface UssRule {
    comment?: string;
    selector: string;
    declarations: string[];
}

const THEME_VARIABLES: ReadonlyArray<[string, string]> = [
    ['--primary-color', '#1976d2'],
    ['--secondary-color', '#9c27b0'],
    ['--error-color', '#d32f2f'],
    ['--info-color', '#0288d1'],
    ['--success-color', '#2e7d32'],
    ['--warning-color', '#ed6c02'],
    ['--text-color-light', '#ffffff'],
    ['--text-color-dark', 'rgba(0, 0, 0, 0.87)'],
    ['--disabled-opacity', '0.38'],
    ['--spacing-1', '4px'],
    ['--spacing-2', '8px'],
    ['--spacing-3', '12px'],
    ['--spacing-4', '16px'],
    ['--font-size-small', '13px'],
    ['--font-size-medium', '14px'],
    ['--font-size-large', '15px'],
];

const BASE_DECLARATIONS = [
    '-unity-font-definition: var(--unity-font-regular)',
    '-unity-font-style: normal',
    '-unity-text-align: middle-center',
    'border-radius: 4px',
    'cursor: pointer',
    'transition-property: background-color, border-color, color, opacity, shadow-color, shadow-offset, shadow-blur, shadow-width',
    'transition-duration: 0.15s',
    'transition-timing-function: ease-out',
    'flex-direction: row',
    'align-items: center',
    'justify-content: center',
    'min-width: 64px',
    'min-height: 36px',
];

const CLEAR_TINT = '-unity-background-image-tint-color: rgba(255, 255, 255, 0)';
const TRANSPARENT = 'background-color: rgba(0, 0, 0, 0)';

function renderRule(rule: UssRule): string {
    const lines: string[] = [];
    if (rule.comment) lines.push(`/* ${rule.comment} */`);
    lines.push(`${rule.selector} {`);
    for (const declaration of rule.declarations) {
        lines.push(declaration.startsWith('/*') ? `    ${declaration}` : `    ${declaration};`);
    }
    lines.push('}');
    return lines.join('\n');
}

// ── Variation rules ────────────────────────────────────────────────────────────

/**
 * Root class plus the variation's own classes. Hashed `css-*` utility classes
 * are left out; a variation with only the root class gets a descriptive class
 * built from its inferred variant, color and size.
 */
export function variationSelector(component: string, variation: Variation): string {
    const rootClass = `Mui${component}-root`;
    const specific = variation.matchedClassNames.filter(cls => cls !== rootClass && cls !== 'MuiButtonBase-root');

    let selector = `.${rootClass}`;
    for (const cls of specific) {
        if (!cls.startsWith('css-')) selector += `.${cls}`;
    }

    if (specific.length === 0) {
        const props = variation.inferredProperties;
        const suffix: string[] = [];
        if (props.variant) suffix.push(`variant-${props.variant}`);
        if (props.color) suffix.push(`color-${props.color}`);
        if (props.size) suffix.push(`size-${props.size}`);
        if (suffix.length > 0) selector += `.${suffix.join('-')}`;
    }
    return selector;
}

function variationRules(component: string, variation: Variation): UssRule[] {
    const selector = variationSelector(component, variation);
    const { variant, color, size } = variation.inferredProperties;
    const disabled = variation.inferredProperties.disabled === 'true';
    const loading = variation.inferredProperties.loading === 'true';
    const accent = color ? `var(--${color}-color, var(--primary-color))` : 'var(--primary-color)';

    const base: string[] = [];
    const hover: string[] = [];
    const active: string[] = [];

    const elevationAttr = variation.parsedNode.attributes.elevation;
    if (elevationAttr) {
        const level = Number.parseInt(elevationAttr, 10);
        if (level > 0) {
            base.push(
                'shadow-color: rgba(0, 0, 0, 0.2)',
                `shadow-offset: ${level * 0.5}px ${level * 0.5}px`,
                `shadow-blur: ${level * 1.5}px`,
                'shadow-width: 0px',
            );
        } else if (!Number.isNaN(level)) {
            base.push('shadow-color: rgba(0, 0, 0, 0)');
        }
    }

    switch (variant) {
        case 'contained':
            base.push(`background-color: ${accent}`, 'color: var(--text-color-light)', 'border-width: 0px', CLEAR_TINT);
            hover.push(`background-color: color-mix(in srgb, ${accent} 90%, black)`);
            if (elevationAttr) hover.push('shadow-offset: 1px 1px', 'shadow-blur: 3px');
            active.push(`background-color: color-mix(in srgb, ${accent} 80%, black)`);
            break;
        case 'outlined':
            base.push(TRANSPARENT, `color: ${accent}`, `border-color: ${accent}`, 'border-width: 1px', CLEAR_TINT);
            hover.push(`background-color: color-mix(in srgb, ${accent} 10%, transparent)`);
            active.push(`background-color: color-mix(in srgb, ${accent} 20%, transparent)`);
            break;
        case 'text':
            base.push(TRANSPARENT, `color: ${accent}`, 'border-width: 0px', CLEAR_TINT);
            hover.push(`background-color: color-mix(in srgb, ${accent} 10%, transparent)`);
            active.push(`background-color: color-mix(in srgb, ${accent} 20%, transparent)`);
            break;
    }

    if (size === 'small') {
        base.push('padding: var(--spacing-1) var(--spacing-2)', '-unity-font-size: var(--font-size-small)');
    } else if (size === 'large') {
        base.push('padding: var(--spacing-2) var(--spacing-3)', '-unity-font-size: var(--font-size-large)');
    } else {
        base.push('padding: var(--spacing-2) var(--spacing-2)', '-unity-font-size: var(--font-size-medium)');
    }

    if (disabled) {
        base.push('-unity-pointer-events: none', 'opacity: var(--disabled-opacity)');
        if (variant === 'contained') {
            base.push('background-color: rgba(0, 0, 0, 0.12)');
        } else if (variant === 'outlined') {
            base.push('border-color: rgba(0, 0, 0, 0.26)', 'color: rgba(0, 0, 0, 0.26)');
        } else {
            base.push('color: rgba(0, 0, 0, 0.26)');
        }
    }

    if (loading) base.push('opacity: 0.7');

    const inline = Object.entries(variation.parsedNode.rawStyleRules);
    if (inline.length > 0) {
        base.push('/* Raw inline styles from sx prop */');
        for (const [prop, value] of inline) base.push(`${prop}: ${value}`);
    }

    const rules: UssRule[] = [{ comment: variation.name.replace(/[ _]/g, '-'), selector, declarations: base }];
    if (hover.length > 0) rules.push({ selector: `${selector}:hover`, declarations: hover });
    if (active.length > 0) rules.push({ selector: `${selector}:active`, declarations: active });
    return rules;
}

// ── Entry point ────────────────────────────────────────────────────────────────

export function ussFileName(component: string): string {
    return `${component.toLowerCase()}_styles.uss`;
}

export function generateUss(definition: ComponentDefinition): string {
    const component = definition.name;
    const blocks: string[] = [
        renderRule({ selector: ':root', declarations: THEME_VARIABLES.map(([name, value]) => `${name}: ${value}`) }),
        `/* USS Rules for ${component} Component */`,
        renderRule({ selector: `.Mui${component}-root`, declarations: BASE_DECLARATIONS }),
    ];
    for (const variation of definition.variations) {
        blocks.push(variationRules(component, variation).map(renderRule).join('\n'));
    }
    return blocks.join('\n\n') + '\n';
}
