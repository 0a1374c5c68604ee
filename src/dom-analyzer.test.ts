import { describe, it, expect } from 'vitest';
import { analyze, cleanLabel, selectPrimaryForm } from './dom-analyzer';
import { makeControl } from './test/fakes';
import type { PageSnapshot, RawControl } from './types/form';

const URL = 'https://jobs.example.com/apply';

describe('DOM analyzer', () => {
  describe('label cleaning', () => {
    it('should collapse whitespace and strip a trailing required marker', () => {
      expect(cleanLabel('  First\n   Name * ')).toBe('First Name');
      expect(cleanLabel('Email**')).toBe('Email');
      expect(cleanLabel('   ')).toBe('');
    });
  });

  describe('primary form', () => {
    it('should pick the qualifying form with the most controls', () => {
      const controls = [
        makeControl({ handle: 'a', formIndex: 0 }),
        makeControl({ handle: 'b', formIndex: 1 }),
        makeControl({ handle: 'c', formIndex: 1 })
      ];
      const forms = [
        { index: 0, hasSubmit: true, textInputCount: 1 },
        { index: 1, hasSubmit: true, textInputCount: 2 }
      ];

      expect(selectPrimaryForm(forms, controls)).toBe(1);
    });

    it('should ignore forms without a submit control or text inputs', () => {
      const controls = [makeControl({ handle: 'a', formIndex: 0 }), makeControl({ handle: 'b', formIndex: 1 })];
      const forms = [
        { index: 0, hasSubmit: false, textInputCount: 1 },
        { index: 1, hasSubmit: true, textInputCount: 0 }
      ];

      expect(selectPrimaryForm(forms, controls)).toBeNull();
    });

    it('should prefer the earlier form on a tie', () => {
      const controls = [makeControl({ handle: 'a', formIndex: 0 }), makeControl({ handle: 'b', formIndex: 1 })];
      const forms = [
        { index: 0, hasSubmit: true, textInputCount: 1 },
        { index: 1, hasSubmit: true, textInputCount: 1 }
      ];

      expect(selectPrimaryForm(forms, controls)).toBe(0);
    });

    it('should only describe controls of the primary form', () => {
      const snapshot: PageSnapshot = {
        url: URL,
        forms: [
          { index: 0, hasSubmit: true, textInputCount: 1 },
          { index: 1, hasSubmit: true, textInputCount: 2 }
        ],
        controls: [
          makeControl({ handle: 'search', formIndex: 0, labelText: 'Search jobs' }),
          makeControl({ handle: 'first', formIndex: 1, labelText: 'First Name' }),
          makeControl({ handle: 'last', formIndex: 1, labelText: 'Last Name' })
        ]
      };

      const inventory = analyze(snapshot);

      expect(inventory.url).toBe(URL);
      expect(inventory.fields.map(field => field.handle)).toEqual(['first', 'last']);
    });

    it('should fall back to every control when no form qualifies', () => {
      const snapshot: PageSnapshot = {
        url: URL,
        forms: [],
        controls: [
          makeControl({ handle: 'a', formIndex: null, labelText: 'Name' }),
          makeControl({ handle: 'b', formIndex: null, labelText: 'Email' })
        ]
      };

      expect(analyze(snapshot).fields.map(field => field.handle)).toEqual(['a', 'b']);
    });
  });

  describe('control filtering', () => {
    it('should exclude hidden, invisible, disabled and button-like controls', () => {
      const snapshot: PageSnapshot = {
        url: URL,
        forms: [],
        controls: [
          makeControl({ handle: 'hidden', type: 'hidden' }),
          makeControl({ handle: 'invisible', visible: false }),
          makeControl({ handle: 'disabled', disabled: true }),
          makeControl({ handle: 'submit', type: 'submit' }),
          makeControl({ handle: 'button', type: 'button' }),
          makeControl({ handle: 'reset', type: 'reset' }),
          makeControl({ handle: 'image', type: 'image' }),
          makeControl({ handle: 'kept', labelText: 'Phone' })
        ]
      };

      expect(analyze(snapshot).fields.map(field => field.handle)).toEqual(['kept']);
    });

    it('should skip malformed entries without throwing', () => {
      const malformed = { handle: '', tag: 'input' } as unknown as RawControl;
      const snapshot: PageSnapshot = {
        url: URL,
        forms: [],
        controls: [malformed, makeControl({ handle: 'ok', labelText: 'City' })]
      };

      expect(analyze(snapshot).fields.map(field => field.handle)).toEqual(['ok']);
    });
  });

  describe('labels', () => {
    const labelsFor = (control: RawControl): string[] =>
      analyze({ url: URL, forms: [], controls: [control] }).fields[0].labels;

    it('should prefer the explicit label', () => {
      expect(labelsFor(makeControl({ handle: 'x', labelText: 'First Name *', placeholder: 'Jane' }))).toEqual(['First Name']);
    });

    it('should use aria-label before the placeholder', () => {
      expect(labelsFor(makeControl({ handle: 'x', ariaLabel: 'Given name', placeholder: 'Jane' }))).toEqual(['Given name']);
    });

    it('should use the placeholder when there is no label or aria-label', () => {
      expect(labelsFor(makeControl({ handle: 'x', placeholder: 'Email address', precedingText: 'Contact' }))).toEqual(['Email address']);
    });

    it('should fall back to preceding text and then container text', () => {
      expect(labelsFor(makeControl({ handle: 'x', precedingText: 'Phone', containerText: 'Phone (mobile)' }))).toEqual(['Phone']);
      expect(labelsFor(makeControl({ handle: 'x', containerText: 'LinkedIn profile' }))).toEqual(['LinkedIn profile']);
    });

    it('should give an empty label set when nothing describes the control', () => {
      expect(labelsFor(makeControl({ handle: 'x' }))).toEqual([]);
    });
  });

  describe('descriptor kinds', () => {
    it('should group radios sharing a name into one radio-group', () => {
      const snapshot: PageSnapshot = {
        url: URL,
        forms: [],
        controls: [
          makeControl({ handle: 'before', labelText: 'First Name' }),
          makeControl({
            handle: 'r1', type: 'radio', name: 'sponsorship', value: 'yes', labelText: 'Yes',
            legendText: 'Will you require sponsorship?', required: true
          }),
          makeControl({ handle: 'after', labelText: 'Last Name' }),
          makeControl({
            handle: 'r2', type: 'radio', name: 'sponsorship', value: 'no', labelText: 'No',
            legendText: 'Will you require sponsorship?'
          })
        ]
      };

      const fields = analyze(snapshot).fields;

      expect(fields.map(field => field.handle)).toEqual(['before', 'r1', 'after']);
      const group = fields[1];
      expect(group.kind).toBe('radio-group');
      expect(group.labels).toEqual(['Will you require sponsorship?']);
      expect(group.required).toBe(true);
      if (group.kind === 'radio-group') {
        expect(group.options).toEqual([
          { handle: 'r1', value: 'yes', label: 'Yes' },
          { handle: 'r2', value: 'no', label: 'No' }
        ]);
      }
    });

    it('should label radio options by value when they have no label', () => {
      const snapshot: PageSnapshot = {
        url: URL,
        forms: [],
        controls: [makeControl({ handle: 'r1', type: 'radio', name: 'relocate', value: 'Maybe' })]
      };

      const [group] = analyze(snapshot).fields;
      expect(group.kind === 'radio-group' && group.options[0].label).toBe('Maybe');
    });

    it('should describe a textarea as multiline text', () => {
      const [field] = analyze({
        url: URL,
        forms: [],
        controls: [makeControl({ handle: 't', tag: 'textarea', type: 'textarea', labelText: 'Cover Letter' })]
      }).fields;

      expect(field).toMatchObject({ kind: 'text', multiline: true, inputType: 'textarea' });
    });

    it('should drop placeholder options with an empty value from selects', () => {
      const [field] = analyze({
        url: URL,
        forms: [],
        controls: [makeControl({
          handle: 's',
          tag: 'select',
          type: 'select',
          labelText: 'Country',
          options: [
            { value: '', label: 'Select...' },
            { value: 'GB', label: 'United Kingdom' },
            { value: 'US', label: 'United States' }
          ]
        })]
      }).fields;

      expect(field.kind).toBe('select');
      if (field.kind === 'select') {
        expect(field.options).toEqual([
          { handle: 's', value: 'GB', label: 'United Kingdom' },
          { handle: 's', value: 'US', label: 'United States' }
        ]);
      }
    });

    it('should describe checkboxes and file inputs', () => {
      const fields = analyze({
        url: URL,
        forms: [],
        controls: [
          makeControl({ handle: 'c', type: 'checkbox', labelText: 'I agree to the privacy policy' }),
          makeControl({ handle: 'f', type: 'file', labelText: 'Resume' })
        ]
      }).fields;

      expect(fields.map(field => field.kind)).toEqual(['checkbox', 'file']);
    });
  });
});
