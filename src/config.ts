import dotenv from 'dotenv';
import path from 'path';
import { parseArgs } from 'util';
import z from 'zod';
import { ConfigError, MissingApiKeyError } from './errors.js';
import { DEFAULT_LOCATION_RULES_PATH } from './locationGate.js';

export const DEFAULT_PROMPT_VERSION = '2025-10-06.v1';
export const DEFAULT_CACHE_DIR = '.cache_llm_matcher';

/**
 * Queries run after the profile's own ones. They name no geography and no "remote" keyword;
 * remote postings surface through the nation-wide searches and the location gate.
 */
export const DEFAULT_BROAD_QUERIES = [
    'software engineering intern',
    'data science intern',
    'data analyst intern',
    'machine learning intern',
    'summer internship'
];

const positiveInt = z.coerce.number().int().positive();

export const MatcherConfigSchema = z.object({
    resumePath: z.string().min(1, 'a resume file is required'),
    apiKey: z.string().min(1),
    model: z.string().min(1).default('gpt-4o-mini'),
    minApproved: positiveInt.default(8),
    maxEvaluations: positiveInt.default(200),
    topN: positiveInt.default(25),
    maxPerQuery: positiveInt.default(120),
    targetLocation: z.string().min(1).default('Dallas, Texas, United States'),
    nationwideLocation: z.string().min(1).default('United States'),
    broadQueries: z.array(z.string().min(1)).default(DEFAULT_BROAD_QUERIES),
    promptVersion: z.string().min(1).default(DEFAULT_PROMPT_VERSION),
    cacheDir: z.string().min(1).default(DEFAULT_CACHE_DIR),
    useCache: z.boolean().default(true),
    outputDir: z.string().min(1).default(() => process.cwd()),
    locationRulesPath: z.string().min(1).default(DEFAULT_LOCATION_RULES_PATH),
    descriptionTrim: positiveInt.default(6000),
    fetchDescriptions: z.boolean().default(true),
    maxRuntimeMs: positiveInt.optional(),
    http: z.object({
        timeoutMs: positiveInt.default(12000),
        retries: z.coerce.number().int().min(0).default(2),
        backoffMs: z.coerce.number().int().min(0).default(500)
    }).default({}),
    llm: z.object({
        timeoutMs: positiveInt.default(60000),
        retries: z.coerce.number().int().min(0).default(3)
    }).default({})
});

export type MatcherConfig = z.infer<typeof MatcherConfigSchema>;

export interface CliArgs {
    resumePath?: string;
    minEvals?: string;
    minApproved?: string;
    top?: string;
    out?: string;
    cacheDir?: string;
    maxPerQuery?: string;
    location?: string;
    noCache: boolean;
    help: boolean;
}

export const USAGE = `Usage: internship-matcher <resume.pdf|.docx|.txt> [--min-evals N] [--min-approved N] [--top N]
       [--out DIR] [--cache-dir DIR] [--max-per-query N] [--location TEXT] [--no-cache]`;

export function parseCliArgs(argv: string[]): CliArgs {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            'min-evals': { type: 'string' },
            'min-approved': { type: 'string' },
            top: { type: 'string' },
            out: { type: 'string' },
            'cache-dir': { type: 'string' },
            'max-per-query': { type: 'string' },
            location: { type: 'string' },
            'no-cache': { type: 'boolean', default: false },
            help: { type: 'boolean', short: 'h', default: false }
        }
    });
    return {
        resumePath: positionals[0],
        minEvals: values['min-evals'],
        minApproved: values['min-approved'],
        top: values.top,
        out: values.out,
        cacheDir: values['cache-dir'],
        maxPerQuery: values['max-per-query'],
        location: values.location,
        noCache: values['no-cache'] ?? false,
        help: values.help ?? false
    };
}

/**
 * Loads `.env` into `process.env`. Variables that are already set win.
 */
export function loadDotenv() {
    dotenv.config();
}

/**
 * Merges CLI arguments over environment variables over defaults.
 *
 * @throws {@link MissingApiKeyError} when OPENAI_API_KEY is not set.
 * @throws {@link ConfigError} when a value is out of range.
 */
export function loadConfig(args: CliArgs, env: NodeJS.ProcessEnv = process.env): MatcherConfig {
    const apiKey = env.OPENAI_API_KEY?.trim();
    if (!apiKey) throw new MissingApiKeyError();
    const parsed = MatcherConfigSchema.safeParse({
        resumePath: args.resumePath ? path.resolve(args.resumePath) : '',
        apiKey,
        model: env.OPENAI_MODEL?.trim() || undefined,
        minApproved: args.minApproved,
        maxEvaluations: args.minEvals,
        topN: args.top,
        maxPerQuery: args.maxPerQuery,
        targetLocation: args.location,
        promptVersion: env.MATCHER_PROMPT_VERSION?.trim() || undefined,
        cacheDir: args.cacheDir ?? (env.MATCHER_CACHE_DIR?.trim() || undefined),
        useCache: !args.noCache,
        outputDir: args.out
    });
    if (!parsed.success) throw new ConfigError(parsed.error);
    return parsed.data;
}
