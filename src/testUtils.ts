// In-process stand-ins for the model, the job boards and the clock, shared by the test files.
import type { JobBoard } from './boards/jobBoard.js';
import type { ModelClient, ModelRequest } from './gateway.js';
import type { DegreeGateOutput, JobEvaluationOutput, JobPosting, RawPosting, ResumeProfile, SearchQuery } from './types.js';

export class FakeModelClient implements ModelClient {
    calls: ModelRequest[] = [];
    private respond: (request: ModelRequest) => string | Promise<string>;

    constructor(respond: (request: ModelRequest) => string | Promise<string>) {
        this.respond = respond;
    }

    async complete(request: ModelRequest): Promise<string> {
        this.calls.push(request);
        return this.respond(request);
    }

    callsOf(kind: ModelRequest['kind']) {
        return this.calls.filter(c => c.kind === kind);
    }
}

export class FakeBoard implements JobBoard {
    readonly id: JobBoard['id'];
    searches: SearchQuery[] = [];
    private results: (query: SearchQuery) => RawPosting[];

    constructor(id: JobBoard['id'], results: (query: SearchQuery) => RawPosting[]) {
        this.id = id;
        this.results = results;
    }

    async search(query: SearchQuery, limit: number): Promise<RawPosting[]> {
        this.searches.push(query);
        return this.results(query).slice(0, limit);
    }
}

export function makeProfile(overrides: Partial<ResumeProfile> = {}): ResumeProfile {
    return {
        domainWeights: { 'software engineering': 0.8 },
        skills: [{ name: 'TypeScript', level: 'advanced' }],
        overallStrength: 7,
        suggestedQueries: ['software engineering intern'],
        constraints: { degreeLevel: 'bachelor', classYear: 'junior', languages: ['English'] },
        ...overrides
    };
}

export function makeRaw(n: number, overrides: Partial<RawPosting> = {}): RawPosting {
    return {
        boardJobId: String(1000 + n),
        title: `Intern ${n}`,
        company: `Company ${n}`,
        location: 'Dallas, TX',
        url: `https://jobs.test/${1000 + n}`,
        snippet: `Internship number ${n}.`,
        ...overrides
    };
}

export function makePosting(overrides: Partial<JobPosting> = {}): JobPosting {
    return {
        id: 'linkedin:1000',
        source: 'linkedin',
        title: 'Software Engineering Intern',
        company: 'Acme',
        location: 'Dallas, TX',
        description: 'Build internal tools in TypeScript.',
        url: 'https://jobs.test/1000',
        discoveryIndex: 0,
        query: 'software engineering intern',
        ...overrides
    };
}

export function evaluationReply(overrides: Partial<JobEvaluationOutput> = {}): string {
    return JSON.stringify({
        decision: 'approve',
        score: 80,
        priority: 'medium',
        matchedSkills: ['TypeScript'],
        gaps: [],
        reason: 'Strong match.',
        hardRules: { gradeFit: true, degreeFit: true, languageFit: true },
        ...overrides
    });
}

export function degreeReply(overrides: Partial<DegreeGateOutput> = {}): string {
    return JSON.stringify({ explicitRequirement: false, requiredDegree: null, candidateMeets: true, reason: 'No degree requirement.', ...overrides });
}

export function profileReply(overrides: Partial<ResumeProfile> = {}): string {
    return JSON.stringify(makeProfile(overrides));
}
