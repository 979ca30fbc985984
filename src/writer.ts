import fs from 'fs/promises';
import path from 'path';
import type { EvaluatedPosting, Priority, ResultRow } from './types.js';

const PRIORITY_RANK: Record<Priority, number> = { high: 0, medium: 1, low: 2 };

const COLUMNS: (keyof ResultRow)[] = [
    'rank', 'score', 'priority', 'decision', 'title', 'company', 'location', 'source', 'url', 'matchedSkills', 'gaps', 'reason'
];

export interface WrittenResults {
    filePath: string;
    rows: ResultRow[];
}

/**
 * Approved postings ordered by score (highest first); equal scores fall back to priority and then to the order
 * in which the run discovered the postings.
 */
export function rankApproved(records: EvaluatedPosting[]): ResultRow[] {
    return records
        .filter(r => r.evaluation.decision === 'approve')
        .sort((a, b) =>
            b.evaluation.score - a.evaluation.score
            || PRIORITY_RANK[a.evaluation.priority] - PRIORITY_RANK[b.evaluation.priority]
            || a.posting.discoveryIndex - b.posting.discoveryIndex)
        .map(({ posting, evaluation }, idx) => ({
            rank: idx + 1,
            score: evaluation.score,
            priority: evaluation.priority,
            decision: evaluation.decision,
            title: posting.title,
            company: posting.company,
            location: posting.location,
            source: posting.source,
            url: posting.url,
            matchedSkills: [...evaluation.matchedSkills],
            gaps: [...evaluation.gaps],
            reason: evaluation.reason
        }));
}

export function escapeCsvField(value: string): string {
    if (/[",\r\n]/.test(value)) return `"${value.replace(/"/g, '""')}"`;
    return value;
}

export function toCsv(rows: ResultRow[]): string {
    const lines = rows.map(row => COLUMNS.map(column => {
        const value = row[column];
        return escapeCsvField(Array.isArray(value) ? value.join('; ') : String(value));
    }).join(','));
    return [COLUMNS.join(','), ...lines].join('\r\n') + '\r\n';
}

/**
 * UTC timestamp for file names; sorts lexically in creation order.
 */
export function timestamp(date: Date) {
    const pad = (n: number) => String(n).padStart(2, '0');
    return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
}

export function formatTopResults(rows: ResultRow[], topN: number): string {
    if (!rows.length) return 'No approved internships.';
    return rows.slice(0, Math.max(0, topN))
        .map(r => `${String(r.rank).padStart(2)}. [${r.score}] (${r.priority}) ${r.title} @ ${r.company} | ${r.location || 'n/a'} | ${r.url}`)
        .join('\n');
}

export class ResultWriter {
    private outputDir: string;
    private now: () => Date;

    constructor(outputDir: string, now: () => Date = () => new Date()) {
        this.outputDir = outputDir;
        this.now = now;
    }

    /**
     * Writes every approved posting (not only the displayed top-N) to `internship_results_<UTC timestamp>.csv`.
     */
    async write(records: EvaluatedPosting[]): Promise<WrittenResults> {
        const rows = rankApproved(records);
        await fs.mkdir(this.outputDir, { recursive: true });
        const filePath = path.join(this.outputDir, `internship_results_${timestamp(this.now())}.csv`);
        await fs.writeFile(filePath, toCsv(rows), 'utf8');
        console.log(`[writer] ${rows.length} approved postings written to ${filePath}`);
        return { filePath, rows };
    }
}
