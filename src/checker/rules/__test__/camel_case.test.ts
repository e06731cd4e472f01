import { describe, it, expect } from 'vitest';

import { check_camel_case } from '../camel_case';

describe('check_camel_case', () => {
  describe('type names (initial upper required)', () => {
    it('accepts UpperCamelCase', () => {
      expect(check_camel_case('Parser', true)).toBeNull();
      expect(check_camel_case('HttpServer2', true)).toBeNull();
      expect(check_camel_case('X', true)).toBeNull();
    });

    it('rejects a lowercase start without scanning further', () => {
      expect(check_camel_case('myClass', true)).toEqual({
        code: 'CAMEL_CASE_INITIAL_UPPER',
        message: "Name 'myClass' should start uppercase",
      });
      expect(check_camel_case('hTMLParser', true)?.code).toBe('CAMEL_CASE_INITIAL_UPPER');
    });

    it('rejects consecutive capitals, including at the start', () => {
      expect(check_camel_case('HTTPServer', true)).toEqual({
        code: 'CAMEL_CASE',
        message: "Name 'HTTPServer' should follow camelCase",
      });
    });
  });

  describe('member names (initial lower required)', () => {
    it('accepts lowerCamelCase', () => {
      expect(check_camel_case('doWork', false)).toBeNull();
      expect(check_camel_case('x', false)).toBeNull();
      expect(check_camel_case('aBcD', false)).toBeNull();
    });

    it('rejects an uppercase start', () => {
      expect(check_camel_case('DoWork', false)).toEqual({
        code: 'CAMEL_CASE_INITIAL_LOWER',
        message: "Name 'DoWork' should start lowercase",
      });
    });

    it('rejects acronym runs', () => {
      expect(check_camel_case('getHTTPCode', false)?.code).toBe('CAMEL_CASE');
      expect(check_camel_case('myHTTP', false)?.code).toBe('CAMEL_CASE');
      expect(check_camel_case('parseURL', false)?.code).toBe('CAMEL_CASE');
    });

    it('allows digits and underscores after the first code point', () => {
      expect(check_camel_case('value_2', false)).toBeNull();
      // 下划线打断了大写连续
      expect(check_camel_case('aB_C', false)).toBeNull();
    });
  });

  describe('uncased or empty names', () => {
    it('flags a non-cased first code point with the generic message', () => {
      expect(check_camel_case('_count', false)).toEqual({
        code: 'CAMEL_CASE',
        message: "Name '_count' should follow camelCase",
      });
      expect(check_camel_case('2fast', true)?.code).toBe('CAMEL_CASE');
      expect(check_camel_case('日本', true)?.code).toBe('CAMEL_CASE');
    });

    it('flags an empty name instead of failing', () => {
      expect(check_camel_case('', false)).toEqual({
        code: 'CAMEL_CASE',
        message: "Name '' should follow camelCase",
      });
    });
  });

  describe('non-ASCII', () => {
    it('uses Unicode case for the first code point', () => {
      expect(check_camel_case('Ärger', true)).toBeNull();
      expect(check_camel_case('éclair', false)).toBeNull();
      expect(check_camel_case('éclair', true)?.code).toBe('CAMEL_CASE_INITIAL_UPPER');
    });

    it('treats a titlecase first letter as uncased', () => {
      expect(check_camel_case('ǅx', true)).toEqual({
        code: 'CAMEL_CASE',
        message: "Name 'ǅx' should follow camelCase",
      });
      expect(check_camel_case('ǅx', false)?.code).toBe('CAMEL_CASE');
    });

    it('advances over astral code points as a single unit', () => {
      const bold_a = '\u{1D400}';
      expect(check_camel_case(`a${bold_a}b`, false)).toBeNull();
      expect(check_camel_case(`a${bold_a}${bold_a}`, false)?.code).toBe('CAMEL_CASE');
    });
  });
});
