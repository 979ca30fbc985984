import fs from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import { DEFAULT_INSTRUCTIONS_DIR, promptBuilder } from './promptBuilder.js';

describe('promptBuilder', () => {
    let dir: string;

    beforeAll(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'matcher-instructions-'));
        fs.writeFileSync(path.join(dir, 'outputRules.txt'), 'Reply with JSON only.');
        fs.writeFileSync(path.join(dir, 'jobEvaluation.txt'), 'Evaluate for {{TARGET_AREA}}.\n\n\n{{OUTPUT_RULES}}');
        fs.writeFileSync(path.join(dir, 'profile.txt'), '   ');
    });
    afterAll(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('fills the reserved and the additional placeholders', () => {
        expect(promptBuilder('job_evaluation', [['{{TARGET_AREA}}', 'Test  Metro']], dir)).toBe('Evaluate for Test Metro.\n\nReply with JSON only.');
    });

    it('validates additional placeholders', () => {
        expect(() => promptBuilder('job_evaluation', [['TARGET_AREA', 'x']], dir)).toThrow('All additional placeholders must be in the format {{PLACEHOLDER}}');
        expect(() => promptBuilder('job_evaluation', [['{{OUTPUT_RULES}}', 'x']], dir)).toThrow('reserved placeholder');
        expect(() => promptBuilder('job_evaluation', [['{{A}}', 'x'], ['{{A}}', 'y']], dir)).toThrow('unique');
        expect(() => promptBuilder('job_evaluation', [['{{A}}', ' ']], dir)).toThrow('non-empty');
    });

    it('fails for missing or empty instruction files', () => {
        expect(() => promptBuilder('degree_gate', [], dir)).toThrow('degree_gate instructions file does not exist');
        expect(() => promptBuilder('profile', [], dir)).toThrow('profile instructions file is empty');
    });

    it('ships instructions for every call kind', () => {
        for (const kind of ['profile', 'degree_gate', 'job_evaluation'] as const) {
            const prompt = promptBuilder(kind, [['{{TARGET_AREA}}', 'Dallas-Fort Worth, TX']]);
            expect(prompt).not.toMatch(/{{[A-Z_]+}}/);
        }
    });

    it('finds the bundled instructions from any working directory', () => {
        vi.spyOn(process, 'cwd').mockReturnValue(dir);

        expect(DEFAULT_INSTRUCTIONS_DIR).toBe(path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../instructions'));
        expect(promptBuilder('profile')).toMatch(/^You read a student's resume/);
    });
});
