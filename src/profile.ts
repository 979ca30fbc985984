import { ProfileExtractionError } from './errors.js';
import type { LlmGateway } from './gateway.js';
import { deepFreeze } from './helpers.js';
import type { ResumeProfile } from './types.js';

export const MAX_SUGGESTED_QUERIES = 12;

function tidy(profile: ResumeProfile): ResumeProfile {
    const seen = new Set<string>();
    const suggestedQueries = profile.suggestedQueries
        .map(q => q.replace(/\s+/g, ' ').trim())
        .filter(q => {
            const k = q.toLowerCase();
            if (!q || seen.has(k)) return false;
            seen.add(k);
            return true;
        })
        .slice(0, MAX_SUGGESTED_QUERIES);
    return { ...profile, suggestedQueries };
}

/**
 * Turns resume text into a {@link ResumeProfile} with a single model call. A reply that fails validation is retried once.
 */
export class ProfileExtractor {
    private gateway: LlmGateway;

    constructor(gateway: LlmGateway) {
        this.gateway = gateway;
    }

    /**
     * @throws {@link ProfileExtractionError} if the model cannot be reached or twice returns an unusable profile.
     */
    async extract(resumeText: string): Promise<ResumeProfile> {
        let issues: string[] = [];
        for (let attempt = 1; attempt <= 2; attempt++) {
            const result = await this.gateway.evaluate('profile', { resumeText });
            if (result.status === 'ok') return deepFreeze(tidy(result.value));
            if (result.status === 'failed') throw new ProfileExtractionError(result.error.message);
            issues = result.issues;
            if (attempt === 1) console.warn('[profile] model returned an invalid profile, asking once more.');
        }
        throw new ProfileExtractionError(issues.join('; '));
    }
}
