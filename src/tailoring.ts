import type { ApplicantProfile } from './config';
import type { Job } from './types/jobs';
import type { ContentTailor, TailoredContent } from './types/services';

const STOPWORDS = new Set([
    'about', 'above', 'after', 'also', 'among', 'and', 'being', 'both', 'build', 'candidate', 'company',
    'could', 'each', 'experience', 'from', 'have', 'help', 'into', 'join', 'just', 'like', 'more',
    'most', 'must', 'other', 'over', 'role', 'should', 'some', 'such', 'team', 'than', 'that', 'their',
    'them', 'then', 'there', 'these', 'they', 'this', 'those', 'through', 'very', 'want', 'were', 'what',
    'when', 'where', 'which', 'while', 'will', 'with', 'work', 'would', 'year', 'years', 'your', 'you'
]);

const MAX_KEYWORDS = 15;

function tokenize(text: string): string[] {
    return text
        .toLowerCase()
        .split(/[^a-z0-9+#]+/)
        .filter(word => word.length >= 4 && !STOPWORDS.has(word) && !/^\d+$/.test(word));
}

/**
 * Most frequent description words, ties broken by first appearance.
 */
export function extractKeywords(text: string, limit: number = MAX_KEYWORDS): string[] {
    const counts = new Map<string, number>();
    for (const word of tokenize(text)) {
        counts.set(word, (counts.get(word) ?? 0) + 1);
    }
    return [...counts.entries()]
        .sort((a, b) => b[1] - a[1])
        .slice(0, limit)
        .map(([word]) => word);
}

function joinList(items: string[]): string {
    if (items.length <= 1) return items.join('');
    return `${items.slice(0, -1).join(', ')} and ${items[items.length - 1]}`;
}

export class KeywordTailor implements ContentTailor {
    async tailor(job: Job, profile: ApplicantProfile): Promise<TailoredContent> {
        const keywords = extractKeywords(`${job.title} ${job.description}`);
        const resumeWords = new Set(tokenize(profile.resumeText ?? ''));
        const matched = keywords.filter(keyword => resumeWords.has(keyword));

        const matchScore = keywords.length === 0 ? 0 : Math.round((matched.length / keywords.length) * 100) / 100;
        const summary = matched.length > 0
            ? `My background in ${joinList(matched.slice(0, 3))} lines up closely with what the ${job.title} role calls for.`
            : `I am excited by the ${job.title} role and the work ${job.company} is doing.`;

        return { summary, matchScore };
    }
}

export interface CoverLetterValues {
    company: string;
    title: string;
    summary: string;
    name: string;
}

/**
 * Fills `{{company}}`, `{{title}}`, `{{summary}}` and `{{name}}`. Unknown
 * placeholders are left as written.
 */
export function renderCoverLetter(template: string, values: CoverLetterValues): string {
    return template.replace(/\{\{\s*(company|title|summary|name)\s*\}\}/g, (_match, key: keyof CoverLetterValues) => values[key]);
}
