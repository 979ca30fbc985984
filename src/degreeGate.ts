import type { LlmGateway } from './gateway.js';
import type { DegreeLevel, DegreeVerdict, JobPosting, ResumeProfile } from './types.js';

const DEGREE_RANK: Record<Exclude<DegreeLevel, 'unknown'>, number> = {
    none: 0,
    high_school: 1,
    associate: 2,
    bachelor: 3,
    master: 4,
    doctorate: 5
};

/**
 * Whether a candidate at `candidate` level satisfies a `required` level; `null` when either side is unknown.
 */
export function degreeSatisfies(candidate: DegreeLevel, required: DegreeLevel | null): boolean | null {
    if (required === null || required === 'unknown' || candidate === 'unknown') return null;
    return DEGREE_RANK[candidate] >= DEGREE_RANK[required];
}

/**
 * Cheap early rejection of postings whose explicit degree requirement the candidate cannot meet.
 * Anything short of an explicit, unmet requirement is eligible, including a failed or unparseable model call.
 */
export class DegreeGate {
    private gateway: LlmGateway;

    constructor(gateway: LlmGateway) {
        this.gateway = gateway;
    }

    async check(posting: JobPosting, profile: ResumeProfile): Promise<DegreeVerdict> {
        const candidate = profile.constraints.degreeLevel;
        const result = await this.gateway.evaluate('degree_gate', {
            degreeLevel: candidate,
            title: posting.title,
            company: posting.company,
            description: posting.description
        });
        if (result.status !== 'ok') {
            console.warn(`[degreeGate] no verdict for ${posting.id} (${result.status}); passing it on to evaluation.`);
            return { decision: 'eligible', requiredDegree: null, reason: 'degree check unavailable', error: result.status === 'failed' ? result.error.message : result.issues.join('; ') };
        }
        const { explicitRequirement, requiredDegree, candidateMeets, reason } = result.value;
        if (!explicitRequirement) return { decision: 'eligible', requiredDegree: null, reason: reason || 'no explicit degree requirement' };
        // the model's own answer is overruled when the degree ranks say otherwise
        if (!candidateMeets || degreeSatisfies(candidate, requiredDegree) === false) {
            return { decision: 'rejected_early', requiredDegree, reason: reason || `requires ${requiredDegree ?? 'a degree the candidate lacks'}` };
        }
        return { decision: 'eligible', requiredDegree, reason };
    }
}
