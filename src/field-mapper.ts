import { z } from 'zod';
import keywordTable from './config/field-keywords.json';
import type { ApplicantProfile } from './config';
import type {
    AssignmentValue,
    FieldDescriptor,
    FieldKind,
    FieldOption,
    FormFieldInventory,
    MappingResult,
    MappingWarning,
    MappingWarningReason,
    SemanticKey
} from './types/form';

const KeywordEntrySchema = z.object({
    key: z.string().min(1),
    keywords: z.array(z.string().min(1)).min(1),
    kinds: z.array(z.enum(['text', 'select', 'radio-group', 'checkbox', 'file'])).optional(),
    demographic: z.boolean().optional()
});

const KeywordTableSchema = z.object({
    entries: z.array(KeywordEntrySchema)
});

export type KeywordEntry = z.infer<typeof KeywordEntrySchema>;

export const DEFAULT_KEYWORD_TABLE: KeywordEntry[] = KeywordTableSchema.parse(keywordTable).entries;

const DEFAULT_KINDS: FieldKind[] = ['text', 'select', 'radio-group'];

const DECLINE_OPTION = /prefer not|decline|don't wish|do not wish|not to (say|answer|disclose|self-identify)|choose not/i;

export interface MappingContext {
    coverLetterText?: string;
}

type ClassificationSource = 'label' | 'name' | 'type';

interface Classification {
    key: SemanticKey;
    via: ClassificationSource;
}

type Answer = string | boolean | undefined;

function normalize(text: string): string {
    return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * `applicant_firstName[0]` → `applicant first name 0`
 */
export function nameToWords(name: string): string {
    return normalize(
        name
            .replace(/([a-z])([A-Z])/g, '$1 $2')
            .replace(/[_\-.[\]]+/g, ' ')
    );
}

function words(text: string): string[] {
    return text.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter(Boolean);
}

function containsRun(haystack: string[], needle: string[]): boolean {
    if (needle.length === 0 || needle.length > haystack.length) return false;
    for (let start = 0; start + needle.length <= haystack.length; start++) {
        if (needle.every((word, offset) => haystack[start + offset] === word)) return true;
    }
    return false;
}

/**
 * Exact label or value first, then whole-word containment in either
 * direction. A non-exact match only counts when it picks out a single option.
 */
export function matchOption(options: FieldOption[], answer: string): FieldOption | null {
    const wanted = normalize(answer);
    if (!wanted) return null;

    const candidates = options.map(option => ({
        option,
        label: normalize(option.label),
        value: normalize(option.value),
        labelWords: words(option.label),
        valueWords: words(option.value)
    }));

    const exact = candidates.find(({ label, value }) => label === wanted || value === wanted);
    if (exact) return exact.option;

    const wantedWords = words(answer);
    const containing = candidates.filter(({ labelWords, valueWords }) =>
        containsRun(labelWords, wantedWords) || containsRun(valueWords, wantedWords));
    if (containing.length > 0) return containing.length === 1 ? containing[0].option : null;

    const contained = candidates.filter(({ labelWords }) => containsRun(wantedWords, labelWords));
    return contained.length === 1 ? contained[0].option : null;
}

function yesNo(value: boolean): string {
    return value ? 'Yes' : 'No';
}

export class FieldMapper {
    private readonly entries: KeywordEntry[];
    private readonly demographicKeys: Set<SemanticKey>;

    constructor(entries: KeywordEntry[] = DEFAULT_KEYWORD_TABLE) {
        this.entries = entries;
        this.demographicKeys = new Set(entries.filter(entry => entry.demographic).map(entry => entry.key));
    }

    classify(field: FieldDescriptor): SemanticKey | null {
        return this.classifyWithSource(field)?.key ?? null;
    }

    map(inventory: FormFieldInventory, profile: ApplicantProfile, context: MappingContext = {}): MappingResult {
        const result: MappingResult = { assignments: [], warnings: [] };
        const claimed = new Set<SemanticKey>();
        const fileSlots = inventory.fields.filter(field => field.kind === 'file').length;

        const warn = (field: FieldDescriptor, reason: MappingWarningReason, key?: SemanticKey): void => {
            const warning: MappingWarning = { handle: field.handle, labels: field.labels, reason };
            if (key) warning.key = key;
            result.warnings.push(warning);
        };

        for (const field of inventory.fields) {
            const classification = this.classifyWithSource(field);

            if (!classification) {
                if (field.required) warn(field, 'unmapped_required');
                continue;
            }

            let { key } = classification;
            if (field.kind === 'file' && classification.via === 'type') {
                if (fileSlots !== 1) {
                    warn(field, 'ambiguous_file');
                    continue;
                }
                key = 'resume_upload';
            }

            if (claimed.has(key)) {
                warn(field, 'duplicate_key', key);
                continue;
            }
            claimed.add(key);

            const resolved = this.resolveValue(field, key, this.answerFor(key, profile, context));
            if ('reason' in resolved) {
                warn(field, resolved.reason, key);
                continue;
            }
            result.assignments.push({ key, field, value: resolved.value });
        }

        return result;
    }

    private classifyWithSource(field: FieldDescriptor): Classification | null {
        for (const label of field.labels) {
            const key = this.lookup(normalize(label), field.kind);
            if (key) return { key, via: 'label' };
        }

        if (field.name) {
            const key = this.lookup(nameToWords(field.name), field.kind);
            if (key) return { key, via: 'name' };
        }

        const inputType = field.inputType.toLowerCase();
        if (inputType === 'email' && field.kind === 'text') return { key: 'email', via: 'type' };
        if (inputType === 'tel' && field.kind === 'text') return { key: 'phone', via: 'type' };
        if (field.kind === 'file') return { key: 'resume_upload', via: 'type' };

        return null;
    }

    private lookup(text: string, kind: FieldKind): SemanticKey | null {
        let best: { key: SemanticKey; length: number } | null = null;

        for (const entry of this.entries) {
            const kinds = entry.kinds ?? DEFAULT_KINDS;
            if (!kinds.includes(kind)) continue;

            for (const keyword of entry.keywords) {
                if (keyword.length > (best?.length ?? 0) && text.includes(keyword.toLowerCase())) {
                    best = { key: entry.key, length: keyword.length };
                }
            }
        }

        return best ? best.key : null;
    }

    private answerFor(key: SemanticKey, profile: ApplicantProfile, context: MappingContext): Answer {
        const { location, links, demographics, workAuthorization } = profile;

        switch (key) {
            case 'first_name': return profile.firstName;
            case 'last_name': return profile.lastName;
            case 'preferred_name': return profile.preferredName ?? profile.firstName;
            case 'full_name': return `${profile.firstName} ${profile.lastName}`;
            case 'email': return profile.email;
            case 'phone': return profile.phone;
            case 'address': return location.address;
            case 'city': return location.city;
            case 'state': return location.state;
            case 'postal_code': return location.postalCode;
            case 'country': return location.country;
            case 'location': return [location.city, location.state].filter(Boolean).join(', ');
            case 'linkedin': return links.linkedin;
            case 'github': return links.github;
            case 'portfolio': return links.portfolio ?? links.website;
            case 'website': return links.website ?? links.portfolio;
            case 'work_authorization': return yesNo(workAuthorization.authorizedToWork);
            case 'sponsorship': return yesNo(workAuthorization.requiresSponsorship);
            case 'gender': return demographics.gender;
            case 'race': return demographics.race;
            case 'ethnicity': return demographics.ethnicity;
            case 'veteran_status': return demographics.veteranStatus;
            case 'disability_status': return demographics.disabilityStatus;
            case 'resume_upload': return profile.resumePath;
            case 'cover_letter_upload': return profile.coverLetterPath;
            case 'cover_letter_text': return context.coverLetterText ?? profile.coverLetterTemplate;
            case 'privacy_consent': return true;
            default: return profile.answers[key];
        }
    }

    private resolveValue(
        field: FieldDescriptor,
        key: SemanticKey,
        answer: Answer
    ): { value: AssignmentValue } | { reason: MappingWarningReason } {
        const demographic = this.demographicKeys.has(key);
        const text = typeof answer === 'boolean' ? yesNo(answer) : answer?.trim();

        switch (field.kind) {
            case 'text':
                if (text) return { value: { type: 'text', text } };
                return { reason: demographic ? 'demographic_unanswered' : 'missing_profile_value' };

            case 'select':
            case 'radio-group': {
                const option = text ? matchOption(field.options, text) : null;
                if (option) return { value: { type: 'option', option } };

                if (demographic) {
                    const decline = field.options.find(candidate => DECLINE_OPTION.test(candidate.label));
                    if (decline) return { value: { type: 'option', option: decline } };
                    return { reason: 'demographic_unanswered' };
                }
                return { reason: text ? 'no_matching_option' : 'missing_profile_value' };
            }

            case 'checkbox':
                if (answer === undefined || text === '') return { reason: 'missing_profile_value' };
                return { value: { type: 'check', checked: answer === true || /^(yes|true)$/i.test(text ?? '') } };

            case 'file':
                if (text) return { value: { type: 'file', path: text } };
                return { reason: 'missing_profile_value' };
        }
    }
}
