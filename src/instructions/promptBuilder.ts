import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';
import { normalizeWhitespace } from '../helpers.js';
import type { ModelCallKind } from '../schemas.js';

const fileMap: Record<ModelCallKind | 'outputRules', string> = {
    profile: 'profile.txt',
    degree_gate: 'degreeGate.txt',
    job_evaluation: 'jobEvaluation.txt',
    outputRules: 'outputRules.txt'
};

const reservedPlaceholders = {
    OUTPUT_RULES: '{{OUTPUT_RULES}}'
};

export const DEFAULT_INSTRUCTIONS_DIR = fileURLToPath(new URL('../../instructions', import.meta.url));

const loaded = new Map<string, string>();

function readInstructions(base: string, key: keyof typeof fileMap): string {
    const p = path.join(base, fileMap[key]);
    const hit = loaded.get(p);
    if (hit !== undefined) return hit;
    if (!fs.existsSync(p)) throw new Error(`${key} instructions file does not exist: ${p}`);
    const content = normalizeWhitespace(fs.readFileSync(p, 'utf8'));
    if (!content) throw new Error(`${key} instructions file is empty: ${p}`);
    loaded.set(p, content);
    return content;
}

/**
 * Builds the system instructions for a model call from `instructions/<kind>.txt`.
 *
 * Every `{{PLACEHOLDER}}` pair in `additionalPlaceholders` is substituted after the reserved ones.
 * The `{{OUTPUT_RULES}}` placeholder is reserved and expands to the shared JSON output rules.
 */
export function promptBuilder(kind: ModelCallKind, additionalPlaceholders: Array<[string, string]> = [], base = DEFAULT_INSTRUCTIONS_DIR): string {
    if (!fs.existsSync(base)) throw new Error(`Instructions directory does not exist: ${base}`);
    if (additionalPlaceholders.length) {
        if (additionalPlaceholders.some(([ph]) => !/^{{.*}}$/.test(ph))) throw new Error('All additional placeholders must be in the format {{PLACEHOLDER}}');
        if (new Set(additionalPlaceholders.map(p => p[0])).size !== additionalPlaceholders.length) throw new Error('All additional placeholders must be unique');
        const reservedVals = Object.values(reservedPlaceholders);
        if (additionalPlaceholders.some(([ph]) => reservedVals.includes(ph))) throw new Error(`Additional placeholders cannot use reserved placeholder names: ${reservedVals.join(', ')}`);
        if (additionalPlaceholders.some(([, v]) => !v.trim())) throw new Error('All additional placeholder values must be non-empty strings');
        additionalPlaceholders = additionalPlaceholders.map(([ph, v]) => [ph, normalizeWhitespace(v)]);
    }
    return [
        [reservedPlaceholders.OUTPUT_RULES, readInstructions(base, 'outputRules')],
        ...additionalPlaceholders
    ].reduce((prev, [ph, val]) => prev.replaceAll(ph, val), readInstructions(base, kind));
}
