// Domain types shared across the matching pipeline.
import type z from 'zod';
import type { DegreeGateOutputSchema, JobEvaluationSchema, ResumeProfileSchema } from './schemas.js';

export type BoardId = 'linkedin' | 'indeed';

export type ResumeProfile = z.infer<typeof ResumeProfileSchema>;
export type DegreeLevel = ResumeProfile['constraints']['degreeLevel'];
export type SkillLevel = ResumeProfile['skills'][number]['level'];

export type DegreeGateOutput = z.infer<typeof DegreeGateOutputSchema>;
export type JobEvaluationOutput = z.infer<typeof JobEvaluationSchema>;

/**
 * A listing as it comes off a result page, before the run assigns ids and order.
 */
export interface RawPosting {
    boardJobId?: string;
    title: string;
    company: string;
    location: string;
    url: string;
    snippet: string;
}

/**
 * A posting as the run tracks it. Read-only once created; enriching it builds a new object.
 */
export interface JobPosting {
    readonly id: string;
    readonly source: BoardId;
    readonly title: string;
    readonly company: string;
    readonly location: string;
    readonly description: string;
    readonly url: string;
    // Position in which the run first saw the posting; breaks score ties.
    readonly discoveryIndex: number;
    readonly query: string;
}

export interface SearchQuery {
    keywords: string;
    location: string;
}

export type LocationReason = 'blank' | 'remote' | 'nationwide' | 'in_area' | 'out_of_area_state' | 'out_of_area_place' | 'ambiguous';

export interface LocationVerdict {
    decision: 'reject' | 'pass';
    reason: LocationReason;
    places: string[];
}

export interface DegreeVerdict {
    decision: 'rejected_early' | 'eligible';
    requiredDegree: DegreeLevel | null;
    reason: string;
    // set when the model call behind the verdict failed
    error?: string;
}

export type Priority = JobEvaluationOutput['priority'];

export type EvaluationResult = Readonly<JobEvaluationOutput>;

export interface EvaluatedPosting {
    posting: JobPosting;
    evaluation: EvaluationResult;
}

export interface ResultRow {
    rank: number;
    score: number;
    priority: Priority;
    decision: EvaluationResult['decision'];
    title: string;
    company: string;
    location: string;
    source: BoardId;
    url: string;
    matchedSkills: string[];
    gaps: string[];
    reason: string;
}

export type RetryOptions<T> = {
    retries?: number;
    baseDelayMs?: number;
    maxDelayMs?: number;
    jitterRatio?: number;
    retryOn?: (info: {
        status: number | null;
        error: unknown;
        attempt: number;
    }) => boolean;
    /**
     * Optional handler invoked when the error message contains 'request too large'.
     * Should retry with a smaller request and return its result.
     */
    onRequestTooLarge?: () => Promise<T>;
};
