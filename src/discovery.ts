/**
 * This module drives the search → gate → evaluate loop that keeps looking for postings
 * until enough of them are approved or one of the bounds is reached.
 */
import { postingId, type JobBoard } from './boards/jobBoard.js';
import type { DegreeGate } from './degreeGate.js';
import type { JobEvaluator } from './jobEvaluator.js';
import type { LocationGate } from './locationGate.js';
import type { DegreeVerdict, EvaluatedPosting, EvaluationResult, JobPosting, LocationVerdict, RawPosting, ResumeProfile, SearchQuery } from './types.js';

export type StopReason = 'target_reached' | 'evaluation_limit' | 'time_limit' | 'queries_exhausted';

type Step =
    | { state: 'seed' }
    | { state: 'crawl' }
    | { state: 'gate'; posting: JobPosting }
    | { state: 'evaluate'; posting: JobPosting }
    | { state: 'check_stop' }
    | { state: 'done'; reason: StopReason };

export type DiscoveryState = Step['state'];

export interface DiscoveryOptions {
    minApproved: number;
    maxEvaluations: number;
    maxPerQuery: number;
    targetLocation: string;
    nationwideLocation: string;
    broadQueries: string[];
    fetchDescriptions: boolean;
    maxRuntimeMs?: number;
    /**
     * Clock used for the runtime budget. Defaults to `Date.now`.
     */
    now?: () => number;
}

export interface DiscoveryCounters {
    queriesRun: number;
    postingsSeen: number;
    duplicates: number;
    locationRejected: number;
    degreeRejected: number;
    degreeErrors: number;
    evaluated: number;
    approved: number;
    denied: number;
    skippedErrors: number;
    crawlErrors: number;
}

/**
 * What happened to one posting. Each verdict is set at most once.
 */
export interface PostingRecord {
    posting: JobPosting;
    location: LocationVerdict;
    degree?: DegreeVerdict;
    evaluation?: EvaluationResult;
    error?: string;
}

export interface DiscoveryReport {
    stopReason: StopReason;
    counters: DiscoveryCounters;
    approved: EvaluatedPosting[];
    records: PostingRecord[];
    queries: SearchQuery[];
}

export interface DiscoveryDependencies {
    boards: JobBoard[];
    locationGate: LocationGate;
    degreeGate: DegreeGate;
    evaluator: JobEvaluator;
}

/**
 * Search queries in the order they will be tried: the profile's own suggestions, then one query per
 * profile domain by descending weight, then the configured broad queries. Each keyword set is run
 * against the target metro first and the whole country second.
 */
export function seedQueries(profile: ResumeProfile, options: Pick<DiscoveryOptions, 'targetLocation' | 'nationwideLocation' | 'broadQueries'>): SearchQuery[] {
    const domains = Object.entries(profile.domainWeights)
        .sort(([a, wa], [b, wb]) => wb - wa || a.localeCompare(b))
        .map(([domain]) => /\bintern/i.test(domain) ? domain : `${domain} intern`);
    const seen = new Set<string>();
    const keywords = [...profile.suggestedQueries, ...domains, ...options.broadQueries]
        .map(k => k.replace(/\s+/g, ' ').trim())
        .filter(k => {
            const key = k.toLowerCase();
            if (!k || seen.has(key)) return false;
            seen.add(key);
            return true;
        });
    return keywords.flatMap(k => [
        { keywords: k, location: options.targetLocation },
        { keywords: k, location: options.nationwideLocation }
    ]);
}

export class DiscoveryController {
    private deps: DiscoveryDependencies;
    private options: DiscoveryOptions;
    private now: () => number;
    state: DiscoveryState = 'seed';

    constructor(deps: DiscoveryDependencies, options: DiscoveryOptions) {
        this.deps = deps;
        this.options = options;
        this.now = options.now ?? Date.now;
    }

    async run(profile: ResumeProfile): Promise<DiscoveryReport> {
        const counters: DiscoveryCounters = {
            queriesRun: 0, postingsSeen: 0, duplicates: 0, locationRejected: 0, degreeRejected: 0, degreeErrors: 0,
            evaluated: 0, approved: 0, denied: 0, skippedErrors: 0, crawlErrors: 0
        };
        const seen = new Set<string>();
        const boardOf = new Map<string, JobBoard>();
        const records = new Map<string, PostingRecord>();
        const approved: EvaluatedPosting[] = [];
        const startedAt = this.now();
        let queries: SearchQuery[] = [];
        let batch: JobPosting[] = [];
        let nextInBatch = 0;

        const checkStop = (): Step => {
            if (counters.approved >= this.options.minApproved) return { state: 'done', reason: 'target_reached' };
            if (counters.evaluated >= this.options.maxEvaluations) return { state: 'done', reason: 'evaluation_limit' };
            if (this.options.maxRuntimeMs !== undefined && this.now() - startedAt >= this.options.maxRuntimeMs) return { state: 'done', reason: 'time_limit' };
            if (nextInBatch < batch.length) return { state: 'gate', posting: batch[nextInBatch++] };
            if (counters.queriesRun < queries.length) return { state: 'crawl' };
            return { state: 'done', reason: 'queries_exhausted' };
        };

        let step: Step = { state: 'seed' };
        while (step.state !== 'done') {
            this.state = step.state;
            switch (step.state) {
                case 'seed':
                    queries = seedQueries(profile, this.options);
                    console.log(`[discovery] ${queries.length} queries seeded; looking for ${this.options.minApproved} approvals within ${this.options.maxEvaluations} evaluations.`);
                    step = { state: 'check_stop' };
                    break;
                case 'crawl': {
                    const query = queries[counters.queriesRun++];
                    batch = await this.crawl(query, seen, boardOf, counters);
                    nextInBatch = 0;
                    console.log(`[discovery] query ${counters.queriesRun}/${queries.length} "${query.keywords}" @ ${query.location}: ${batch.length} new postings.`);
                    step = { state: 'check_stop' };
                    break;
                }
                case 'gate': {
                    const location = this.deps.locationGate.check(step.posting.location);
                    const record: PostingRecord = { posting: step.posting, location };
                    records.set(step.posting.id, record);
                    if (location.decision === 'reject') {
                        counters.locationRejected++;
                        step = { state: 'check_stop' };
                        break;
                    }
                    const posting = await this.withDescription(step.posting, boardOf.get(step.posting.id));
                    record.posting = posting;
                    record.degree = await this.deps.degreeGate.check(posting, profile);
                    if (record.degree.error) counters.degreeErrors++;
                    if (record.degree.decision === 'rejected_early') {
                        counters.degreeRejected++;
                        step = { state: 'check_stop' };
                        break;
                    }
                    step = { state: 'evaluate', posting };
                    break;
                }
                case 'evaluate': {
                    const { posting } = step;
                    const record = records.get(posting.id);
                    const outcome = await this.deps.evaluator.score(posting, profile);
                    counters.evaluated++;
                    if (!outcome.ok) {
                        counters.skippedErrors++;
                        if (record) record.error = outcome.reason;
                        console.warn(`[discovery] skipped ${posting.title} @ ${posting.company}: ${outcome.reason}`);
                    } else {
                        if (record) record.evaluation = outcome.evaluation;
                        if (outcome.evaluation.decision === 'approve') {
                            counters.approved++;
                            approved.push({ posting, evaluation: outcome.evaluation });
                            console.log(`[discovery] approved ${counters.approved}/${this.options.minApproved}: ${posting.title} @ ${posting.company} (score ${outcome.evaluation.score})`);
                        } else {
                            counters.denied++;
                        }
                    }
                    step = { state: 'check_stop' };
                    break;
                }
                case 'check_stop':
                    step = checkStop();
                    break;
            }
        }
        this.state = 'done';
        return { stopReason: step.reason, counters, approved, records: [...records.values()], queries };
    }

    private async crawl(query: SearchQuery, seen: Set<string>, boardOf: Map<string, JobBoard>, counters: DiscoveryCounters): Promise<JobPosting[]> {
        const fresh: JobPosting[] = [];
        for (const board of this.deps.boards) {
            let results: RawPosting[];
            try {
                results = await board.search(query, this.options.maxPerQuery);
            } catch (err) {
                counters.crawlErrors++;
                console.warn(`[crawl] ${err instanceof Error ? err.message : String(err)}; skipping.`);
                continue;
            }
            for (const raw of results) {
                const id = postingId(board.id, raw);
                if (seen.has(id)) {
                    counters.duplicates++;
                    continue;
                }
                seen.add(id);
                boardOf.set(id, board);
                fresh.push({
                    id,
                    source: board.id,
                    title: raw.title,
                    company: raw.company,
                    location: raw.location,
                    description: raw.snippet,
                    url: raw.url,
                    discoveryIndex: counters.postingsSeen++,
                    query: query.keywords
                });
            }
        }
        return fresh;
    }

    private async withDescription(posting: JobPosting, board: JobBoard | undefined): Promise<JobPosting> {
        if (!this.options.fetchDescriptions || !board?.fetchDescription) return posting;
        try {
            const description = await board.fetchDescription(posting);
            return description ? { ...posting, description } : posting;
        } catch (err) {
            console.warn(`[crawl] could not fetch the description of ${posting.url}; using the search snippet.`, err instanceof Error ? err.message : err);
            return posting;
        }
    }
}
