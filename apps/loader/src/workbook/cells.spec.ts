import { DateParseError } from '@folio/db';
import { CellError, parseCellDate, parseCellDecimal, unwrapCell } from './cells';

describe('parseCellDate', () => {
  it('truncates a native datetime to its calendar date', () => {
    expect(parseCellDate(new Date(Date.UTC(2022, 1, 15)), 'A2')).toBe('2022-02-15');
    expect(parseCellDate(new Date(Date.UTC(2022, 1, 15, 23, 59, 59)), 'A2')).toBe('2022-02-15');
  });

  it('widens a two-digit year in DD/MM/YY', () => {
    expect(parseCellDate('15/02/22', 'A2')).toBe('2022-02-15');
    expect(parseCellDate(' 1/3/23 ', 'A2')).toBe('2023-03-01');
  });

  it('accepts a four-digit year and ISO text', () => {
    expect(parseCellDate('16/02/2023', 'A2')).toBe('2023-02-16');
    expect(parseCellDate('2022-12-31', 'A2')).toBe('2022-12-31');
  });

  it('names the cell it could not read', () => {
    expect(() => parseCellDate('15-02-22', 'A7')).toThrow(DateParseError);
    expect(() => parseCellDate('15-02-22', 'A7')).toThrow(
      'Cannot parse date "15-02-22" in cell A7',
    );
  });

  it('rejects dates that are not on the calendar', () => {
    expect(() => parseCellDate('31/02/22', 'A3')).toThrow(DateParseError);
    expect(() => parseCellDate('2022-13-01', 'A3')).toThrow(DateParseError);
  });

  it('rejects serial numbers, booleans and error cells', () => {
    expect(() => parseCellDate(44607, 'A4')).toThrow('Cannot parse date 44607 in cell A4');
    expect(() => parseCellDate(true, 'A4')).toThrow(DateParseError);
    expect(() => parseCellDate(new CellError('#N/A'), 'A4')).toThrow(DateParseError);
  });
});

describe('parseCellDecimal', () => {
  it('reads floats through their shortest form', () => {
    expect(parseCellDecimal(0.28)?.toString()).toBe('0.28');
    expect(parseCellDecimal(0.1 + 0.2)?.toString()).toBe('0.30000000000000004');
  });

  it('reads numeric text, with a comma separator too', () => {
    expect(parseCellDecimal(' 100.25 ')?.toString()).toBe('100.25');
    expect(parseCellDecimal('0,15')?.toString()).toBe('0.15');
    expect(parseCellDecimal('-1.5e3')?.toString()).toBe('-1500');
    expect(parseCellDecimal('.5')?.toString()).toBe('0.5');
  });

  it('returns null for anything else', () => {
    expect(parseCellDecimal('abc')).toBeNull();
    expect(parseCellDecimal('Infinity')).toBeNull();
    expect(parseCellDecimal('0x1')).toBeNull();
    expect(parseCellDecimal('0b1')).toBeNull();
    expect(parseCellDecimal('0o1')).toBeNull();
    expect(parseCellDecimal(Number.NaN)).toBeNull();
    expect(parseCellDecimal(null)).toBeNull();
    expect(parseCellDecimal(new Date())).toBeNull();
    expect(parseCellDecimal(new CellError('#DIV/0!'))).toBeNull();
  });
});

describe('unwrapCell', () => {
  it('takes the cached result of a formula', () => {
    expect(unwrapCell({ formula: 'B2*2', result: 4, date1904: false })).toBe(4);
  });

  it('joins rich text runs', () => {
    expect(unwrapCell({ richText: [{ text: 'EE' }, { text: 'UU' }] })).toBe('EEUU');
  });

  it('maps error cells to CellError', () => {
    const v = unwrapCell({ error: '#REF!' });
    expect(v).toBeInstanceOf(CellError);
    expect(String(v)).toBe('#REF!');
  });
});
