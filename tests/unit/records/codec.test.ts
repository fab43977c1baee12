import { describe, expect, it } from 'vitest';

import {
  decodeProperty,
  encodeProperty,
  toPlainValue,
  valueToStrings,
} from '@/modules/records/core/codec.js';
import { EncodeContractError } from '@/modules/records/core/errors.js';
import {
  EMPTY,
  UNKNOWN_PERSON,
  booleanValue,
  countValue,
  dateValue,
  numberValue,
  optionListValue,
  optionValue,
  textListValue,
  textValue,
} from '@/modules/records/core/types.js';

import { rawProperty } from '../../fixtures/builders.js';

describe('decodeProperty', () => {
  describe('text kinds', () => {
    it('concatenates title segments without a separator', () => {
      expect(decodeProperty(rawProperty.title('Write ', 'report'))).toEqual(
        textValue('Write report')
      );
    });

    it('decodes rich text', () => {
      expect(decodeProperty(rawProperty.text('Line one'))).toEqual(textValue('Line one'));
    });

    it('decodes an empty segment list to empty text', () => {
      expect(decodeProperty(rawProperty.title())).toEqual(textValue(''));
    });

    it('falls back to text.content when plain_text is absent', () => {
      expect(
        decodeProperty({ type: 'title', title: [{ type: 'text', text: { content: 'Draft' } }] })
      ).toEqual(textValue('Draft'));
    });

    it('decodes url, email and phone as text', () => {
      expect(decodeProperty(rawProperty.url('https://example.com'))).toEqual(
        textValue('https://example.com')
      );
      expect(decodeProperty(rawProperty.email('ana@example.com'))).toEqual(
        textValue('ana@example.com')
      );
      expect(decodeProperty(rawProperty.phone('+40 700 000 000'))).toEqual(
        textValue('+40 700 000 000')
      );
    });

    it('decodes an unset url to EMPTY', () => {
      expect(decodeProperty(rawProperty.url(null))).toBe(EMPTY);
    });
  });

  describe('scalar kinds', () => {
    it('decodes numbers', () => {
      expect(decodeProperty(rawProperty.number(3.5))).toEqual(numberValue(3.5));
    });

    it('decodes an unset number to EMPTY', () => {
      expect(decodeProperty(rawProperty.number(null))).toBe(EMPTY);
    });

    it('decodes checkboxes', () => {
      expect(decodeProperty(rawProperty.checkbox(true))).toEqual(booleanValue(true));
      expect(decodeProperty(rawProperty.checkbox(false))).toEqual(booleanValue(false));
    });

    it('decodes a date to its start only', () => {
      expect(decodeProperty(rawProperty.date('2024-03-01', '2024-03-05'))).toEqual(
        dateValue('2024-03-01')
      );
    });

    it('decodes an unset date to EMPTY', () => {
      expect(decodeProperty(rawProperty.date(null))).toBe(EMPTY);
    });
  });

  describe('option kinds', () => {
    it('decodes a select to its label', () => {
      expect(decodeProperty(rawProperty.select('Done'))).toEqual(optionValue('Done'));
    });

    it('decodes an unset select to EMPTY', () => {
      expect(decodeProperty(rawProperty.select(null))).toBe(EMPTY);
    });

    it('decodes a multi-select to its labels in order', () => {
      expect(decodeProperty(rawProperty.multiSelect('B', 'A'))).toEqual(
        optionListValue(['B', 'A'])
      );
    });
  });

  describe('read-only kinds', () => {
    it('decodes people to names, substituting unnamed users', () => {
      expect(decodeProperty(rawProperty.people('Ana', null, ''))).toEqual(
        textListValue(['Ana', UNKNOWN_PERSON, UNKNOWN_PERSON])
      );
    });

    it('decodes files to their names', () => {
      expect(decodeProperty(rawProperty.files('spec.pdf', 'logo.png'))).toEqual(
        textListValue(['spec.pdf', 'logo.png'])
      );
    });

    it('decodes a relation to the number of related items', () => {
      expect(decodeProperty(rawProperty.relation(3))).toEqual(countValue(3));
      expect(decodeProperty(rawProperty.relation(0))).toEqual(countValue(0));
    });

    it('decodes a number rollup', () => {
      expect(decodeProperty(rawProperty.rollup({ type: 'number', number: 42 }))).toEqual(
        numberValue(42)
      );
    });

    it('decodes a date rollup to its start', () => {
      expect(
        decodeProperty(rawProperty.rollup({ type: 'date', date: { start: '2024-05-01', end: null } }))
      ).toEqual(dateValue('2024-05-01'));
    });

    it('flattens an array rollup and skips empty items', () => {
      const rollup = {
        type: 'array',
        array: [
          rawProperty.title('Alpha'),
          rawProperty.number(7),
          rawProperty.multiSelect('A', 'B'),
          rawProperty.select(null),
        ],
      };

      expect(decodeProperty(rawProperty.rollup(rollup))).toEqual(
        textListValue(['Alpha', '7', 'A', 'B'])
      );
    });

    it('decodes formula results by their own type', () => {
      expect(decodeProperty(rawProperty.formula({ type: 'string', string: 'ok' }))).toEqual(
        textValue('ok')
      );
      expect(decodeProperty(rawProperty.formula({ type: 'number', number: 2 }))).toEqual(
        numberValue(2)
      );
      expect(decodeProperty(rawProperty.formula({ type: 'boolean', boolean: false }))).toEqual(
        booleanValue(false)
      );
      expect(
        decodeProperty(rawProperty.formula({ type: 'date', date: { start: '2024-01-02' } }))
      ).toEqual(dateValue('2024-01-02'));
    });

    it('decodes an unknown rollup or formula type to EMPTY', () => {
      expect(decodeProperty(rawProperty.rollup({ type: 'incomplete' }))).toBe(EMPTY);
      expect(decodeProperty(rawProperty.formula({ type: 'unknown' }))).toBe(EMPTY);
    });
  });

  describe('malformed payloads', () => {
    it('decodes unsupported wire types to EMPTY', () => {
      expect(decodeProperty({ type: 'button', button: {} })).toBe(EMPTY);
    });

    it('never throws on malformed input', () => {
      const inputs: unknown[] = [
        null,
        undefined,
        42,
        'title',
        [],
        {},
        { type: 7 },
        { type: 'number', number: 'NaN' },
        { type: 'number', number: Number.POSITIVE_INFINITY },
        { type: 'checkbox', checkbox: 'true' },
        { type: 'title', title: 'not a list' },
        { type: 'people', people: null },
        { type: 'constructor' },
        { type: 'toString' },
      ];

      for (const input of inputs) {
        expect(decodeProperty(input)).toBe(EMPTY);
      }
    });

    it('ignores malformed segments inside a text list', () => {
      expect(decodeProperty({ type: 'title', title: [null, { plain_text: 'kept' }, 5] })).toEqual(
        textValue('kept')
      );
    });
  });
});

describe('encodeProperty', () => {
  it('encodes text as a single text segment', () => {
    expect(encodeProperty('title', textValue('Write report'))).toEqual({
      type: 'title',
      title: [{ type: 'text', text: { content: 'Write report' } }],
    });
    expect(encodeProperty('text', textValue('Notes'))).toEqual({
      type: 'rich_text',
      rich_text: [{ type: 'text', text: { content: 'Notes' } }],
    });
  });

  it('encodes scalar kinds', () => {
    expect(encodeProperty('number', numberValue(3))).toEqual({ type: 'number', number: 3 });
    expect(encodeProperty('checkbox', booleanValue(true))).toEqual({
      type: 'checkbox',
      checkbox: true,
    });
    expect(encodeProperty('date', dateValue('2024-03-01'))).toEqual({
      type: 'date',
      date: { start: '2024-03-01' },
    });
    expect(encodeProperty('phone', textValue('+40 700'))).toEqual({
      type: 'phone_number',
      phone_number: '+40 700',
    });
  });

  it('encodes option kinds by name', () => {
    expect(encodeProperty('select', optionValue('Done'))).toEqual({
      type: 'select',
      select: { name: 'Done' },
    });
    expect(encodeProperty('multiSelect', optionListValue(['A', 'B']))).toEqual({
      type: 'multi_select',
      multi_select: [{ name: 'A' }, { name: 'B' }],
    });
  });

  it('encodes EMPTY as the cleared shape of nullable kinds', () => {
    expect(encodeProperty('number', EMPTY)).toEqual({ type: 'number', number: null });
    expect(encodeProperty('select', EMPTY)).toEqual({ type: 'select', select: null });
    expect(encodeProperty('date', EMPTY)).toEqual({ type: 'date', date: null });
    expect(encodeProperty('url', EMPTY)).toEqual({ type: 'url', url: null });
  });

  it('refuses EMPTY for kinds whose cleared shape decodes to a value', () => {
    expect(() => encodeProperty('title', EMPTY)).toThrow(
      'Cannot encode empty value as title: value shape does not match field kind'
    );
    expect(() => encodeProperty('text', EMPTY)).toThrow(EncodeContractError);
    expect(() => encodeProperty('multiSelect', EMPTY)).toThrow(EncodeContractError);
  });

  it('throws for read-only kinds', () => {
    expect(() => encodeProperty('people', textListValue(['Ana']))).toThrow(EncodeContractError);
    expect(() => encodeProperty('formula', textValue('x'))).toThrow(
      'Cannot encode text value as formula: field is read-only'
    );
  });

  it('throws when the value shape does not match the kind', () => {
    expect(() => encodeProperty('number', textValue('3'))).toThrow(
      'Cannot encode text value as number: value shape does not match field kind'
    );
    expect(() => encodeProperty('checkbox', EMPTY)).toThrow(EncodeContractError);
  });

  it('decodes what it encodes', () => {
    const cases = [
      ['title', textValue('Write report')],
      ['text', textValue('')],
      ['number', numberValue(-0.5)],
      ['select', optionValue('In Progress')],
      ['multiSelect', optionListValue(['A', 'B'])],
      ['date', dateValue('2024-03-01')],
      ['checkbox', booleanValue(false)],
      ['url', textValue('https://example.com')],
      ['email', textValue('ana@example.com')],
      ['phone', textValue('+40 700')],
      ['number', EMPTY],
      ['select', EMPTY],
      ['date', EMPTY],
      ['url', EMPTY],
      ['email', EMPTY],
      ['phone', EMPTY],
    ] as const;

    for (const [kind, value] of cases) {
      expect(decodeProperty(encodeProperty(kind, value))).toEqual(value);
    }
  });
});

describe('plain values', () => {
  it('strips the tag and maps EMPTY to null', () => {
    expect(toPlainValue(EMPTY)).toBeNull();
    expect(toPlainValue(numberValue(4))).toBe(4);
    expect(toPlainValue(optionListValue(['A']))).toEqual(['A']);
  });

  it('flattens values to display strings', () => {
    expect(valueToStrings(EMPTY)).toEqual([]);
    expect(valueToStrings(booleanValue(true))).toEqual(['true']);
    expect(valueToStrings(countValue(2))).toEqual(['2']);
    expect(valueToStrings(textListValue(['a', 'b']))).toEqual(['a', 'b']);
  });
});
