import { beforeEach, describe, expect, it, vi } from 'vitest';
import { MemoryCacheStore } from './cache.js';
import { DegreeGate, degreeSatisfies } from './degreeGate.js';
import { LlmGateway } from './gateway.js';
import { degreeReply, FakeModelClient, makePosting, makeProfile } from './testUtils.js';

function gateWith(client: FakeModelClient) {
    return new DegreeGate(new LlmGateway(client, new MemoryCacheStore(), { promptVersion: 'v1', retry: { retries: 0 } }));
}

describe('degreeSatisfies', () => {
    it('compares degree ranks', () => {
        expect(degreeSatisfies('bachelor', 'master')).toBe(false);
        expect(degreeSatisfies('master', 'bachelor')).toBe(true);
        expect(degreeSatisfies('bachelor', 'bachelor')).toBe(true);
    });

    it('cannot decide with an unknown side', () => {
        expect(degreeSatisfies('unknown', 'master')).toBeNull();
        expect(degreeSatisfies('bachelor', null)).toBeNull();
    });
});

describe('DegreeGate', () => {
    const profile = makeProfile();

    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    it('rejects a posting that requires a master degree for a bachelor candidate', async () => {
        const client = new FakeModelClient(() => degreeReply({ explicitRequirement: true, requiredDegree: 'master', candidateMeets: false, reason: 'Master students only.' }));
        const verdict = await gateWith(client).check(makePosting({ description: 'Open to Master students only.' }), profile);

        expect(verdict).toEqual({ decision: 'rejected_early', requiredDegree: 'master', reason: 'Master students only.' });
    });

    it('rejects on the degree ranks even when the model says the candidate qualifies', async () => {
        const client = new FakeModelClient(() => degreeReply({ explicitRequirement: true, requiredDegree: 'doctorate', candidateMeets: true, reason: '' }));
        const verdict = await gateWith(client).check(makePosting(), profile);

        expect(verdict).toEqual({ decision: 'rejected_early', requiredDegree: 'doctorate', reason: 'requires doctorate' });
    });

    it('passes postings without an explicit requirement', async () => {
        const verdict = await gateWith(new FakeModelClient(() => degreeReply())).check(makePosting(), profile);
        expect(verdict).toEqual({ decision: 'eligible', requiredDegree: null, reason: 'No degree requirement.' });
    });

    it('passes a met requirement', async () => {
        const client = new FakeModelClient(() => degreeReply({ explicitRequirement: true, requiredDegree: 'bachelor', candidateMeets: true, reason: 'Pursuing a BS.' }));
        await expect(gateWith(client).check(makePosting(), profile)).resolves.toMatchObject({ decision: 'eligible', requiredDegree: 'bachelor' });
    });

    it('lets the posting through when the check itself fails', async () => {
        const verdict = await gateWith(new FakeModelClient(() => 'garbage')).check(makePosting(), profile);

        expect(verdict).toEqual({ decision: 'eligible', requiredDegree: null, reason: 'degree check unavailable', error: 'reply contains no JSON object' });
    });

    it('sends only what the check needs', async () => {
        const client = new FakeModelClient(() => degreeReply());
        await gateWith(client).check(makePosting(), profile);

        expect(JSON.parse(client.calls[0].input)).toEqual({
            degreeLevel: 'bachelor',
            title: 'Software Engineering Intern',
            company: 'Acme',
            description: 'Build internal tools in TypeScript.'
        });
    });
});
