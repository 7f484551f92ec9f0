import { hydrateFields, intField, serializeFields, stringField, type FieldList } from './record-fields';

interface Widget {
  id: number;
  label: string;
  weight: number;
}

const WIDGET_FIELDS: FieldList<Widget> = {
  id: intField,
  label: stringField,
  weight: intField,
};

const DEFAULTS: Widget = { id: 0, label: 'unnamed', weight: 1 };

describe('record-fields', () => {
  describe('intField', () => {
    it.each([
      [7, 7],
      [-2, -2],
      ['42', 42],
      [' 13 ', 13],
      ['-5', -5],
    ])('should decode %p as %p', (input, expected) => {
      expect(intField(input)).toBe(expected);
    });

    it.each([[1.5], ['1.5'], ['abc'], [''], [null], [undefined], [true], [Number.NaN], ['99999999999999999999']])(
      'should reject %p',
      (input) => {
        expect(intField(input)).toBeUndefined();
      },
    );
  });

  describe('stringField', () => {
    it('should pass strings through, including empty ones', () => {
      expect(stringField('x')).toBe('x');
      expect(stringField('')).toBe('');
    });

    it('should reject non-strings', () => {
      expect(stringField(3)).toBeUndefined();
      expect(stringField(null)).toBeUndefined();
    });
  });

  describe('hydrateFields', () => {
    it('should copy declared fields and ignore the rest', () => {
      const result = hydrateFields(DEFAULTS, WIDGET_FIELDS, { id: '9', label: 'gear', colour: 'red' });

      expect(result).toEqual({ id: 9, label: 'gear', weight: 1 });
    });

    it('should keep defaults for missing and undecodable fields', () => {
      const result = hydrateFields(DEFAULTS, WIDGET_FIELDS, { weight: 'heavy' });

      expect(result).toEqual(DEFAULTS);
    });

    it('should not modify the defaults object', () => {
      const defaults: Widget = { ...DEFAULTS };
      hydrateFields(defaults, WIDGET_FIELDS, { id: 3 });

      expect(defaults.id).toBe(0);
    });

    it('should ignore inherited properties of the source', () => {
      const source: Record<string, unknown> = Object.create({ label: 'inherited' });

      expect(hydrateFields(DEFAULTS, WIDGET_FIELDS, source).label).toBe('unnamed');
    });
  });

  describe('serializeFields', () => {
    it('should emit exactly the declared fields', () => {
      const row = serializeFields({ id: 1, label: 'gear', weight: 3 }, WIDGET_FIELDS);

      expect(row).toEqual({ id: 1, label: 'gear', weight: 3 });
      expect(Object.keys(row)).toEqual(['id', 'label', 'weight']);
    });
  });
});
