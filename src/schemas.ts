import z from 'zod';

export const DEGREE_LEVELS = ['none', 'high_school', 'associate', 'bachelor', 'master', 'doctorate', 'unknown'] as const;

// Lowest level first, so "bachelor or master" resolves to the lesser requirement.
const DEGREE_SYNONYMS: Array<[RegExp, typeof DEGREE_LEVELS[number]]> = [
    [/^(none|no|n\/a|not_required)$/, 'none'],
    [/(^|_)(high_school|highschool|hs|ged)(_|$)/, 'high_school'],
    [/(^|_)(associate|aa|aas)(_|$)|^as$/, 'associate'],
    [/(^|_)(bachelors?|ba|bs|bsc|b\.s\.?|b\.a\.?|undergrad(uate)?)(_|$)/, 'bachelor'],
    [/(^|_)(masters?|ms|msc|ma|m\.s\.?|mba|graduate)(_|$)/, 'master'],
    [/(^|_)(doctorate|doctoral|phd|ph\.d\.?)(_|$)/, 'doctorate']
];

const lower = (v: unknown) => typeof v === 'string' ? v.trim().toLowerCase() : v;

/**
 * Maps the free-form degree names models tend to produce ("Bachelor's degree", "PhD", "MS") onto {@link DEGREE_LEVELS}.
 */
export function normalizeDegree(value: unknown): unknown {
    if (value === null || value === undefined) return 'unknown';
    if (typeof value !== 'string') return value;
    const s = value.trim().toLowerCase().replace(/['’]s\b/g, '').replace(/\bdegree\b/g, ' ').trim().replace(/[\s-]+/g, '_');
    if (!s) return 'unknown';
    if ((DEGREE_LEVELS as readonly string[]).includes(s)) return s;
    for (const [pattern, level] of DEGREE_SYNONYMS) if (pattern.test(s)) return level;
    return s;
}

export const DegreeLevelSchema = z.preprocess(normalizeDegree, z.enum(DEGREE_LEVELS));

const stringList = z.array(z.string().trim().min(1)).default([]);

export const ResumeProfileSchema = z.object({
    domainWeights: z.record(z.string(), z.coerce.number().min(0)),
    skills: z.array(z.object({
        name: z.string().trim().min(1),
        level: z.preprocess(lower, z.enum(['beginner', 'intermediate', 'advanced', 'expert'])).catch('intermediate')
    })),
    overallStrength: z.coerce.number().min(0).max(10),
    suggestedQueries: z.array(z.string().trim().min(1)).min(1),
    constraints: z.object({
        degreeLevel: DegreeLevelSchema,
        classYear: z.string().trim().nullable().default(null),
        languages: stringList
    })
});

export const DegreeGateOutputSchema = z.object({
    explicitRequirement: z.boolean(),
    requiredDegree: z.preprocess(v => v === null || v === undefined || v === '' ? null : normalizeDegree(v), z.enum(DEGREE_LEVELS).nullable()),
    candidateMeets: z.boolean(),
    reason: z.string().default('')
});

export const JobEvaluationSchema = z.object({
    decision: z.preprocess(lower, z.enum(['approve', 'deny'])),
    score: z.coerce.number().finite().transform(n => Math.min(100, Math.max(0, Math.round(n)))),
    priority: z.preprocess(lower, z.enum(['high', 'medium', 'low'])),
    matchedSkills: stringList,
    gaps: stringList,
    reason: z.string().trim().min(1),
    hardRules: z.object({
        gradeFit: z.boolean(),
        degreeFit: z.boolean(),
        languageFit: z.boolean()
    })
});

export interface ModelOutputs {
    profile: z.infer<typeof ResumeProfileSchema>;
    degree_gate: z.infer<typeof DegreeGateOutputSchema>;
    job_evaluation: z.infer<typeof JobEvaluationSchema>;
}

export type ModelCallKind = keyof ModelOutputs;
export type ModelOutput<K extends ModelCallKind> = ModelOutputs[K];

export const MODEL_OUTPUT_SCHEMAS: { [K in ModelCallKind]: z.ZodType<ModelOutputs[K], z.ZodTypeDef, unknown> } = {
    profile: ResumeProfileSchema,
    degree_gate: DegreeGateOutputSchema,
    job_evaluation: JobEvaluationSchema
};
