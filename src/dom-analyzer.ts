import { logger } from './utils/logger';
import type {
    FieldDescriptor,
    FieldOption,
    FormFieldInventory,
    PageSnapshot,
    RawControl,
    RawForm
} from './types/form';

const EXCLUDED_INPUT_TYPES = new Set(['hidden', 'submit', 'button', 'reset', 'image']);
const TEXT_INPUT_TYPES = new Set(['text', 'email', 'tel', 'url', 'number', 'search', 'password', 'date', '']);

/**
 * Collapses whitespace and drops a trailing required marker.
 */
export function cleanLabel(text: string): string {
    return text.replace(/\s+/g, ' ').trim().replace(/\s*\*+$/, '').trim();
}

function firstLabel(...candidates: string[]): string[] {
    for (const candidate of candidates) {
        const cleaned = cleanLabel(candidate);
        if (cleaned) return [cleaned];
    }
    return [];
}

function isWellFormed(control: unknown): control is RawControl {
    return typeof control === 'object' && control !== null
        && 'handle' in control && typeof control.handle === 'string' && control.handle.length > 0
        && 'tag' in control && typeof control.tag === 'string'
        && 'type' in control && typeof control.type === 'string'
        && 'options' in control && Array.isArray(control.options);
}

function isFillable(control: RawControl): boolean {
    if (!control.visible || control.disabled) return false;
    const tag = control.tag.toLowerCase();
    if (tag === 'input') return !EXCLUDED_INPUT_TYPES.has(control.type.toLowerCase());
    return tag === 'select' || tag === 'textarea';
}

/**
 * Picks the form with a submit control, at least one text input and the most
 * controls. Earlier forms win ties.
 */
export function selectPrimaryForm(forms: RawForm[], controls: RawControl[]): number | null {
    let best: { index: number; count: number } | null = null;

    for (const form of forms) {
        if (!form.hasSubmit || form.textInputCount < 1) continue;
        const count = controls.filter(control => control.formIndex === form.index).length;
        if (!best || count > best.count) {
            best = { index: form.index, count };
        }
    }

    return best ? best.index : null;
}

function describeControl(control: RawControl): FieldDescriptor | null {
    const tag = control.tag.toLowerCase();
    const type = control.type.toLowerCase();
    const base = {
        handle: control.handle,
        labels: firstLabel(control.labelText, control.ariaLabel, control.placeholder, control.precedingText, control.containerText),
        name: control.name,
        inputType: tag === 'input' ? type : tag,
        required: control.required
    };

    if (tag === 'textarea') {
        return { ...base, kind: 'text', multiline: true };
    }

    if (tag === 'select') {
        const options: FieldOption[] = control.options
            .filter(option => option.value.trim() !== '')
            .map(option => ({
                handle: control.handle,
                value: option.value,
                label: cleanLabel(option.label) || option.value
            }));
        return { ...base, kind: 'select', options };
    }

    if (type === 'checkbox') return { ...base, kind: 'checkbox' };
    if (type === 'file') return { ...base, kind: 'file' };
    if (TEXT_INPUT_TYPES.has(type)) return { ...base, kind: 'text', multiline: false };

    return null;
}

function describeRadioGroup(radios: RawControl[]): FieldDescriptor {
    const [first] = radios;
    return {
        kind: 'radio-group',
        handle: first.handle,
        labels: firstLabel(first.legendText, first.ariaLabel, first.precedingText, first.containerText),
        name: first.name,
        inputType: 'radio',
        required: radios.some(radio => radio.required),
        options: radios.map(radio => ({
            handle: radio.handle,
            value: radio.value,
            label: cleanLabel(radio.labelText) || radio.value
        }))
    };
}

/**
 * Builds the ordered field inventory for a page snapshot. Malformed controls
 * are skipped rather than rejected.
 */
export function analyze(snapshot: PageSnapshot): FormFieldInventory {
    const controls: unknown[] = Array.isArray(snapshot.controls) ? snapshot.controls : [];
    const wellFormed = controls.filter(isWellFormed);
    const skipped = controls.length - wellFormed.length;
    if (skipped > 0) {
        logger.warn(`Skipped ${skipped} malformed control(s) on ${snapshot.url}`);
    }

    const forms = Array.isArray(snapshot.forms) ? snapshot.forms : [];
    const primary = selectPrimaryForm(forms, wellFormed);
    const scoped = primary === null
        ? wellFormed
        : wellFormed.filter(control => control.formIndex === primary);

    const fields: FieldDescriptor[] = [];
    const radioGroups = new Map<string, RawControl[]>();

    for (const control of scoped.filter(isFillable)) {
        if (control.type.toLowerCase() === 'radio') {
            const groupKey = control.name || control.handle;
            const group = radioGroups.get(groupKey);
            if (group) {
                group.push(control);
                continue;
            }
            radioGroups.set(groupKey, [control]);
            // placeholder keeps the group at the position of its first radio
            fields.push(describeRadioGroup([control]));
            continue;
        }

        const descriptor = describeControl(control);
        if (descriptor) fields.push(descriptor);
    }

    const resolved = fields.map(field => {
        if (field.kind !== 'radio-group') return field;
        const group = radioGroups.get(field.name || field.handle);
        return group ? describeRadioGroup(group) : field;
    });

    logger.debug(`Analyzed ${resolved.length} field(s) on ${snapshot.url}`, {
        primaryForm: primary
    });

    return { url: snapshot.url, fields: resolved };
}
