export type FieldKind = 'text' | 'select' | 'radio-group' | 'checkbox' | 'file';

export interface RawOption {
    value: string;
    label: string;
}

/**
 * One control as collected inside the page. Every string is already trimmed by
 * the collector but may be empty.
 */
export interface RawControl {
    handle: string;
    tag: string;
    type: string;
    name: string;
    id: string;
    formIndex: number | null;
    visible: boolean;
    disabled: boolean;
    required: boolean;
    labelText: string;
    ariaLabel: string;
    placeholder: string;
    precedingText: string;
    containerText: string;
    legendText: string;
    value: string;
    options: RawOption[];
}

export interface RawForm {
    index: number;
    hasSubmit: boolean;
    textInputCount: number;
    submitHandle?: string;
}

export interface PageSnapshot {
    url: string;
    forms: RawForm[];
    controls: RawControl[];
    // submit-looking button outside any form
    looseSubmitHandle?: string;
}

export interface FieldOption {
    handle: string;
    value: string;
    label: string;
}

interface FieldBase {
    handle: string;
    labels: string[];
    name: string;
    inputType: string;
    required: boolean;
}

export type FieldDescriptor =
    | (FieldBase & { kind: 'text'; multiline: boolean })
    | (FieldBase & { kind: 'select'; options: FieldOption[] })
    | (FieldBase & { kind: 'radio-group'; options: FieldOption[] })
    | (FieldBase & { kind: 'checkbox' })
    | (FieldBase & { kind: 'file' });

export interface FormFieldInventory {
    url: string;
    fields: FieldDescriptor[];
}

export type SemanticKey = string;

export type AssignmentValue =
    | { type: 'text'; text: string }
    | { type: 'option'; option: FieldOption }
    | { type: 'check'; checked: boolean }
    | { type: 'file'; path: string };

export interface FieldAssignment {
    key: SemanticKey;
    field: FieldDescriptor;
    value: AssignmentValue;
}

export type MappingWarningReason =
    | 'unmapped_required'
    | 'duplicate_key'
    | 'missing_profile_value'
    | 'no_matching_option'
    | 'demographic_unanswered'
    | 'ambiguous_file';

export interface MappingWarning {
    handle: string;
    labels: string[];
    key?: SemanticKey;
    reason: MappingWarningReason;
}

export interface MappingResult {
    assignments: FieldAssignment[];
    warnings: MappingWarning[];
}

export type CaptchaKind =
    | 'recaptcha_v2'
    | 'recaptcha_v3'
    | 'hcaptcha'
    | 'funcaptcha'
    | 'turnstile'
    | 'image'
    | 'unknown';

/**
 * What the page reported about possible CAPTCHA widgets. Classification happens
 * outside the page.
 */
export interface CaptchaProbe {
    matchedSelectors: string[];
    text: string;
    siteKey?: string;
}

export interface DetectedCaptcha {
    kind: CaptchaKind;
    selector: string;
    siteKey?: string;
}

export interface PageSignals {
    url: string;
    text: string;
    validationErrors: number;
    modelAssessment?: {
        isComplete: boolean;
        confirmationMessage?: string;
    };
}
