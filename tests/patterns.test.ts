import { describe, expect, it } from 'vitest';
import { cleanDigits, extractBankCards, extractIdCards, extractPhones, sliceBytes } from '../src/utils/patterns';

describe('extractPhones', () => {
  it('finds a number inside Chinese text with byte offsets', () => {
    const text = '联系13812345678请拨打';
    expect(extractPhones(text)).toEqual([{ value: '13812345678', start: 6, end: 17 }]);
    expect(sliceBytes(text, 6, 17)).toBe('13812345678');
  });

  it('returns every match left to right', () => {
    const text = '联系方式：13812345678，备用：15912345678';
    expect(extractPhones(text)).toEqual([
      { value: '13812345678', start: 15, end: 26 },
      { value: '15912345678', start: 38, end: 49 },
    ]);
  });

  it('finds numbers separated by a single character', () => {
    expect(extractPhones('13812345678,15912345678').map((c) => c.value)).toEqual(['13812345678', '15912345678']);
  });

  it('accepts a country code and separators', () => {
    expect(extractPhones('+86 138 1234 5678').map((c) => c.value)).toEqual(['+86 138 1234 5678']);
    expect(extractPhones('tel:138-1234-5678').map((c) => c.value)).toEqual(['138-1234-5678']);
  });

  it('does not match inside a longer digit run', () => {
    expect(extractPhones('913812345678')).toEqual([]);
    expect(extractPhones('138123456789')).toEqual([]);
    expect(extractPhones('12812345678')).toEqual([]);
  });
});

describe('extractIdCards', () => {
  it('matches the structural shape', () => {
    expect(extractIdCards('身份证11010519900307888X核实')).toEqual([
      { value: '11010519900307888X', start: 9, end: 27 },
    ]);
  });

  it('rejects impossible months in the pattern', () => {
    expect(extractIdCards('11010519901307888X')).toEqual([]);
  });

  it('does not match when followed by another check character', () => {
    expect(extractIdCards('110105199003072039X')).toEqual([]);
  });
});

describe('extractBankCards', () => {
  it('matches 16 digits with or without separators', () => {
    expect(extractBankCards('卡号6225880123456789绑定').map((c) => c.value)).toEqual(['6225880123456789']);
    expect(extractBankCards('6225 8801 2345 6789').map((c) => c.value)).toEqual(['6225 8801 2345 6789']);
  });

  it('overmatches up to three extra digits', () => {
    expect(extractBankCards('6222021234567890128').map((c) => c.value)).toEqual(['6222021234567890128']);
  });

  it('ignores short and overly long digit runs', () => {
    expect(extractBankCards('622588012345')).toEqual([]);
    expect(extractBankCards('62258801234567890123')).toEqual([]);
  });
});

describe('cleanDigits', () => {
  it('strips every non-digit', () => {
    expect(cleanDigits('138-1234-5678')).toBe('13812345678');
    expect(cleanDigits('6225 8801 2345 6789')).toBe('6225880123456789');
  });
});
