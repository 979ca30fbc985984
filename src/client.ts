#!/usr/bin/env node
/**
 * This module contains the entry point of the internship matcher: it wires the pipeline together
 * and exposes it as a command line tool.
 */
import fs from 'fs';
import path from 'path';
import { pathToFileURL } from 'url';
import { HtmlJobBoard, type JobBoard } from './boards/jobBoard.js';
import { HttpClient, type HtmlFetcher } from './boards/httpClient.js';
import { indeedSurface } from './boards/indeed.js';
import { linkedInSurface } from './boards/linkedin.js';
import { FileCacheStore, MemoryCacheStore, type CacheStore } from './cache.js';
import { loadConfig, loadDotenv, parseCliArgs, USAGE, type MatcherConfig } from './config.js';
import { DegreeGate } from './degreeGate.js';
import { DiscoveryController, type DiscoveryReport } from './discovery.js';
import { LlmGateway, OpenAIModelClient, type GatewayStats, type ModelClient } from './gateway.js';
import { JobEvaluator } from './jobEvaluator.js';
import { LocationGate, loadLocationRules } from './locationGate.js';
import { ProfileExtractor } from './profile.js';
import { loadResume } from './resumeLoader.js';
import type { ResumeProfile } from './types.js';
import { formatTopResults, ResultWriter, type WrittenResults } from './writer.js';

/**
 * Collaborators that reach outside the process. Each one defaults to the real implementation.
 */
export interface MatcherDependencies {
    modelClient?: ModelClient;
    cache?: CacheStore;
    fetcher?: HtmlFetcher;
    boards?: JobBoard[];
    readResume?: (filePath: string) => Promise<string>;
    clock?: () => number;
    now?: () => Date;
    instructionsDir?: string;
}

export interface MatcherRun {
    profile: ResumeProfile;
    report: DiscoveryReport;
    written: WrittenResults;
    gatewayStats: GatewayStats;
}

export function formatSummary(config: MatcherConfig, { report, written, gatewayStats }: Omit<MatcherRun, 'profile'>): string {
    const c = report.counters;
    return [
        `Stopped: ${report.stopReason.replace(/_/g, ' ')}; found ${c.approved} of target ${config.minApproved} approvals.`,
        `Queries run: ${c.queriesRun}/${report.queries.length}, postings seen: ${c.postingsSeen}, crawl errors: ${c.crawlErrors}.`,
        `Rejected by location: ${c.locationRejected}, by degree: ${c.degreeRejected}; degree check errors: ${c.degreeErrors}.`,
        `Evaluated: ${c.evaluated}, approved: ${c.approved}, denied: ${c.denied}, skipped due to error: ${c.skippedErrors}.`,
        `Model calls: ${gatewayStats.modelCalls}, cache hits: ${gatewayStats.cacheHits}.`,
        `Results: ${written.filePath}`
    ].join('\n');
}

/**
 * The InternshipMatcher turns a resume into a ranked list of internships it is worth applying to.
 */
export class InternshipMatcher {
    /**
     * Runs the whole pipeline once.
     *
     * @throws `UnknownTargetAreaError` when the target location names no city and state.
     * @throws `ResumeParseError` when the resume yields no text.
     * @throws `ProfileExtractionError` when no profile can be derived from it.
     *
     * @remarks
     * Failures of single postings or queries are logged and counted, never thrown.
     */
    public static async start(config: MatcherConfig, deps: MatcherDependencies = {}): Promise<MatcherRun> {
        // one location drives both the search geography and the gate's target area
        const locationGate = new LocationGate(loadLocationRules(config.locationRulesPath), config.targetLocation);
        console.log(`Target area: ${locationGate.targetArea}.`);

        const resumeText = await (deps.readResume ?? loadResume)(config.resumePath);
        console.log(`Loaded resume ${path.basename(config.resumePath)} (${resumeText.length} characters).`);

        const cache = deps.cache ?? (config.useCache ? new FileCacheStore(config.cacheDir) : new MemoryCacheStore());
        const gateway = new LlmGateway(
            deps.modelClient ?? new OpenAIModelClient({ apiKey: config.apiKey, model: config.model, timeoutMs: config.llm.timeoutMs }),
            cache,
            {
                promptVersion: config.promptVersion,
                placeholders: [['{{TARGET_AREA}}', locationGate.targetArea]],
                descriptionTrim: config.descriptionTrim,
                retry: { retries: config.llm.retries },
                instructionsDir: deps.instructionsDir
            }
        );

        const profile = await new ProfileExtractor(gateway).extract(resumeText);
        console.log(`Profile: strength ${profile.overallStrength}/10, degree ${profile.constraints.degreeLevel}, ${profile.suggestedQueries.length} suggested queries.`);

        const fetcher = deps.fetcher ?? new HttpClient(config.http);
        const boards = deps.boards ?? [new HtmlJobBoard(fetcher, linkedInSurface), new HtmlJobBoard(fetcher, indeedSurface)];
        const report = await new DiscoveryController(
            { boards, locationGate, degreeGate: new DegreeGate(gateway), evaluator: new JobEvaluator(gateway) },
            {
                minApproved: config.minApproved,
                maxEvaluations: config.maxEvaluations,
                maxPerQuery: config.maxPerQuery,
                targetLocation: config.targetLocation,
                nationwideLocation: config.nationwideLocation,
                broadQueries: config.broadQueries,
                fetchDescriptions: config.fetchDescriptions,
                maxRuntimeMs: config.maxRuntimeMs,
                now: deps.clock
            }
        ).run(profile);

        const written = await new ResultWriter(config.outputDir, deps.now).write(report.approved);
        console.log(`\nTop ${Math.min(config.topN, written.rows.length)} internships:\n${formatTopResults(written.rows, config.topN)}\n`);
        const run = { profile, report, written, gatewayStats: { ...gateway.stats } };
        console.log(formatSummary(config, run));
        return run;
    }
}

async function main(argv: string[]) {
    const args = parseCliArgs(argv);
    if (args.help) {
        console.log(USAGE);
        return;
    }
    loadDotenv();
    await InternshipMatcher.start(loadConfig(args));
}

if (process.argv[1] && import.meta.url === pathToFileURL(fs.realpathSync(process.argv[1])).href) {
    main(process.argv.slice(2)).catch(err => {
        console.error('Error running internship matcher:', err instanceof Error ? err.message : err);
        process.exitCode = 1;
    });
}
