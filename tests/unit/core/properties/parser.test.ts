import { describe, it, expect } from 'vitest';
import {
  parseProperties,
  endsWithContinuation,
  findSeparator,
  unescapeKey,
} from '../../../../src/core/properties/parser.js';
import { ErrorCodes } from '../../../../src/utils/errors.js';

describe('parseProperties', () => {
  it('should skip comments and blank lines', () => {
    const { entries, errors } = parseProperties('# comment\n! bang comment\n\n   # indented\nkey=value\n');

    expect(errors).toEqual([]);
    expect(entries).toEqual([{ profile: '', key: 'key', rawValue: 'value', lineNumber: 5 }]);
  });

  it('should split at the first equals sign and trim both sides', () => {
    const { entries } = parseProperties('  jdbc.url =  jdbc:postgresql://db/app?ssl=true  ');

    expect(entries[0]).toMatchObject({ key: 'jdbc.url', rawValue: 'jdbc:postgresql://db/app?ssl=true' });
  });

  it('should accept an empty value', () => {
    const { entries } = parseProperties('empty.value=');

    expect(entries[0].rawValue).toBe('');
  });

  it('should split profile prefixes from keys', () => {
    const { entries } = parseProperties('%prod.kafka-streams.producer.acks=all');

    expect(entries[0]).toEqual({
      profile: 'prod',
      key: 'kafka-streams.producer.acks',
      rawValue: 'all',
      lineNumber: 1,
    });
  });

  it('should join continuation lines and report the first line number', () => {
    const { entries } = parseProperties('first=1\nlist=a,\\\n    b,\\\n    c\nlast=2');

    expect(entries).toEqual([
      { profile: '', key: 'first', rawValue: '1', lineNumber: 1 },
      { profile: '', key: 'list', rawValue: 'a,b,c', lineNumber: 2 },
      { profile: '', key: 'last', rawValue: '2', lineNumber: 5 },
    ]);
  });

  it('should end a continuation at end of input', () => {
    const { entries } = parseProperties('dangling=x\\');

    expect(entries[0].rawValue).toBe('x');
  });

  it('should handle CRLF line endings', () => {
    const { entries } = parseProperties('a=1\r\nb=2\r\n');

    expect(entries.map((e) => [e.key, e.rawValue, e.lineNumber])).toEqual([
      ['a', '1', 1],
      ['b', '2', 2],
    ]);
  });

  it('should unescape keys but keep values raw', () => {
    const { entries } = parseProperties('my\\=key=C:\\\\temp');

    expect(entries[0].key).toBe('my=key');
    expect(entries[0].rawValue).toBe('C:\\\\temp');
  });

  it('should record a line without separator and keep parsing', () => {
    const { entries, errors } = parseProperties('kafka.a=1\nbad.line.no.equals\nkafka.b=2');

    expect(entries.map((e) => e.key)).toEqual(['kafka.a', 'kafka.b']);
    expect(errors).toEqual([
      {
        code: ErrorCodes.MISSING_SEPARATOR,
        lineNumber: 2,
        line: 'bad.line.no.equals',
        message: "'bad.line.no.equals' does not match 'key=value' format",
      },
    ]);
  });

  it('should reject an empty key', () => {
    const { errors } = parseProperties('=orphan');

    expect(errors[0]).toMatchObject({ code: 'P002', message: 'Property key is empty' });
  });

  it('should reject a profile prefix without a name', () => {
    const { errors } = parseProperties('%prod=1\n%.key=2');

    expect(errors.map((e) => [e.code, e.lineNumber])).toEqual([
      ['P003', 1],
      ['P003', 2],
    ]);
    expect(errors[0].message).toBe("Profile prefix in '%prod' must have the form %<profile>.<key>");
  });

  it('should reject a profile prefix without a key', () => {
    const { errors } = parseProperties('%prod.=1');

    expect(errors[0]).toMatchObject({
      code: 'P002',
      message: "Property key after profile prefix '%prod.' is empty",
    });
  });
});

describe('endsWithContinuation', () => {
  it('should count trailing backslashes', () => {
    expect(endsWithContinuation('a=b\\')).toBe(true);
    expect(endsWithContinuation('a=b\\\\')).toBe(false);
    expect(endsWithContinuation('a=b\\\\\\')).toBe(true);
    expect(endsWithContinuation('a=b')).toBe(false);
  });
});

describe('findSeparator', () => {
  it('should skip escaped equals signs', () => {
    expect(findSeparator('a\\=b=c')).toBe(4);
    expect(findSeparator('path\\\\=x')).toBe(6);
    expect(findSeparator('no separator')).toBe(-1);
  });
});

describe('unescapeKey', () => {
  it('should resolve escapes', () => {
    expect(unescapeKey('a\\:b')).toBe('a:b');
    expect(unescapeKey('with\\ space')).toBe('with space');
    expect(unescapeKey('tab\\there')).toBe('tab\there');
    expect(unescapeKey('back\\\\slash')).toBe('back\\slash');
  });

  it('should keep a trailing lone backslash', () => {
    expect(unescapeKey('end\\')).toBe('end\\');
  });
});
