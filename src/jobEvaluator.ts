import type { LlmGateway } from './gateway.js';
import type { EvaluationResult, JobEvaluationOutput, JobPosting, ResumeProfile } from './types.js';

export type EvaluationOutcome =
    | { ok: true; evaluation: EvaluationResult; cached: boolean }
    | { ok: false; reason: string };

/**
 * A failed hard rule (class year, degree level, language) always means deny, whatever the model decided.
 */
export function enforceHardRules(output: JobEvaluationOutput): EvaluationResult {
    const failed = Object.entries(output.hardRules).filter(([, passed]) => !passed).map(([rule]) => rule);
    if (!failed.length || output.decision === 'deny') return Object.freeze({ ...output });
    const denied: JobEvaluationOutput = { ...output, decision: 'deny', reason: `${output.reason} (denied: failed ${failed.join(', ')})` };
    return Object.freeze(denied);
}

export class JobEvaluator {
    private gateway: LlmGateway;

    constructor(gateway: LlmGateway) {
        this.gateway = gateway;
    }

    async score(posting: JobPosting, profile: ResumeProfile): Promise<EvaluationOutcome> {
        const result = await this.gateway.evaluate('job_evaluation', {
            profile,
            posting: {
                title: posting.title,
                company: posting.company,
                location: posting.location,
                description: posting.description,
                url: posting.url
            }
        });
        switch (result.status) {
            case 'ok':
                return { ok: true, evaluation: enforceHardRules(result.value), cached: result.cached };
            case 'invalid':
                return { ok: false, reason: `invalid model output: ${result.issues.join('; ')}` };
            case 'failed':
                return { ok: false, reason: result.error.message };
        }
    }
}
