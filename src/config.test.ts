import path from 'path';
import { describe, expect, it } from 'vitest';
import { DEFAULT_CACHE_DIR, DEFAULT_PROMPT_VERSION, loadConfig, parseCliArgs } from './config.js';
import { ConfigError, MissingApiKeyError } from './errors.js';

const env = { OPENAI_API_KEY: 'test-key' };

describe('parseCliArgs', () => {
    it('reads the resume path and every flag', () => {
        expect(parseCliArgs(['cv.pdf', '--min-evals', '50', '--min-approved', '3', '--top', '10', '--out', 'results', '--cache-dir', '.c', '--max-per-query', '40', '--location', 'Austin, TX', '--no-cache']))
            .toEqual({
                resumePath: 'cv.pdf',
                minEvals: '50',
                minApproved: '3',
                top: '10',
                out: 'results',
                cacheDir: '.c',
                maxPerQuery: '40',
                location: 'Austin, TX',
                noCache: true,
                help: false
            });
    });

    it('throws on unknown flags', () => {
        expect(() => parseCliArgs(['cv.pdf', '--verbose'])).toThrow();
    });
});

describe('loadConfig', () => {
    it('applies the defaults', () => {
        const config = loadConfig(parseCliArgs(['cv.pdf']), env);
        expect(config).toMatchObject({
            resumePath: path.resolve('cv.pdf'),
            apiKey: 'test-key',
            model: 'gpt-4o-mini',
            minApproved: 8,
            maxEvaluations: 200,
            topN: 25,
            maxPerQuery: 120,
            targetLocation: 'Dallas, Texas, United States',
            nationwideLocation: 'United States',
            promptVersion: DEFAULT_PROMPT_VERSION,
            cacheDir: DEFAULT_CACHE_DIR,
            useCache: true,
            outputDir: process.cwd(),
            descriptionTrim: 6000,
            fetchDescriptions: true,
            http: { timeoutMs: 12000, retries: 2, backoffMs: 500 },
            llm: { timeoutMs: 60000, retries: 3 }
        });
        expect(config.maxRuntimeMs).toBeUndefined();
    });

    it('lets flags and environment variables override defaults', () => {
        const config = loadConfig(parseCliArgs(['cv.pdf', '--min-evals', '50', '--top', '5', '--no-cache']), {
            ...env,
            OPENAI_MODEL: 'gpt-4o',
            MATCHER_PROMPT_VERSION: 'v9',
            MATCHER_CACHE_DIR: '/tmp/matcher-cache'
        });
        expect(config).toMatchObject({ maxEvaluations: 50, topN: 5, useCache: false, model: 'gpt-4o', promptVersion: 'v9', cacheDir: '/tmp/matcher-cache' });
    });

    it('prefers the cache directory flag over the environment', () => {
        const config = loadConfig(parseCliArgs(['cv.pdf', '--cache-dir', '.flag-cache']), { ...env, MATCHER_CACHE_DIR: '.env-cache' });
        expect(config.cacheDir).toBe('.flag-cache');
    });

    it('requires an API key', () => {
        expect(() => loadConfig(parseCliArgs(['cv.pdf']), {})).toThrow(MissingApiKeyError);
        expect(() => loadConfig(parseCliArgs(['cv.pdf']), { OPENAI_API_KEY: '  ' })).toThrow(MissingApiKeyError);
    });

    it('rejects a missing resume and out of range numbers', () => {
        expect(() => loadConfig(parseCliArgs([]), env)).toThrow(ConfigError);
        expect(() => loadConfig(parseCliArgs(['cv.pdf', '--min-approved', '0']), env)).toThrow(ConfigError);
        expect(() => loadConfig(parseCliArgs(['cv.pdf', '--top', 'many']), env)).toThrow(ConfigError);
    });
});
