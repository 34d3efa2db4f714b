import { CellKind, CellText, ClassifyValue, IsTaggedValue } from '../src/value-type';

test('IsTaggedValue', () => {

  expect(IsTaggedValue({ type: 'formula', value: 'A1+1' })).toBeTruthy();
  expect(IsTaggedValue({ type: 'number', value: '3' })).toBeTruthy();
  expect(IsTaggedValue({ type: 'boolean', value: true })).toBeFalsy();
  expect(IsTaggedValue({ type: 'string', value: null })).toBeFalsy();
  expect(IsTaggedValue({ type: 'string' })).toBeFalsy();
  expect(IsTaggedValue('string')).toBeFalsy();
  expect(IsTaggedValue(null)).toBeFalsy();

});

test('CellText', () => {

  expect(CellText(null)).toEqual('');
  expect(CellText(undefined)).toEqual('');
  expect(CellText(false)).toEqual('false');
  expect(CellText(0)).toEqual('0');

});

test('untagged values', () => {

  expect(ClassifyValue(42)).toEqual({ kind: CellKind.number, value: 42 });
  expect(ClassifyValue(-1.5)).toEqual({ kind: CellKind.number, value: -1.5 });
  expect(ClassifyValue(10n)).toEqual({ kind: CellKind.number, value: 10n });

  expect(ClassifyValue(NaN)).toEqual({ kind: CellKind.string, value: 'NaN' });
  expect(ClassifyValue(Infinity)).toEqual({ kind: CellKind.string, value: 'Infinity' });

  // numeric strings are not converted
  expect(ClassifyValue('42')).toEqual({ kind: CellKind.string, value: '42' });
  expect(ClassifyValue('hello')).toEqual({ kind: CellKind.string, value: 'hello' });

  expect(ClassifyValue(true)).toEqual({ kind: CellKind.string, value: 'true' });
  expect(ClassifyValue(null)).toEqual({ kind: CellKind.string, value: '' });
  expect(ClassifyValue(undefined)).toEqual({ kind: CellKind.string, value: '' });

  const date = new Date(2013, 3, 5);
  expect(ClassifyValue(date)).toEqual({ kind: CellKind.datetime, value: date });
  expect(ClassifyValue(new Date(NaN))).toEqual({ kind: CellKind.string, value: 'Invalid Date' });

});

test('tagged values', () => {

  expect(ClassifyValue({ type: 'formula', value: 'SUM(A1:A3)' }))
    .toEqual({ kind: CellKind.formula, value: 'SUM(A1:A3)' });

  expect(ClassifyValue({ type: 'string', value: 17 }))
    .toEqual({ kind: CellKind.string, value: '17' });

  expect(ClassifyValue({ type: 'number', value: '3.5' }))
    .toEqual({ kind: CellKind.number, value: 3.5 });

  expect(ClassifyValue({ type: 'number', value: 'three' }))
    .toEqual({ kind: CellKind.string, value: 'three' });

  const date = new Date(2020, 0, 1);
  expect(ClassifyValue({ type: 'datetime', value: date }))
    .toEqual({ kind: CellKind.datetime, value: date });

  expect(ClassifyValue({ type: 'datetime', value: 0 }))
    .toEqual({ kind: CellKind.datetime, value: new Date(0) });

  expect(ClassifyValue({ type: 'datetime', value: 'not a date' }))
    .toEqual({ kind: CellKind.string, value: 'not a date' });

});
