import { describe, expect, it, vi } from 'vitest';
import { buildFieldMatcher, PII_FIELDS } from '../lib/index';

describe('buildFieldMatcher', () => {
  it('locates sensitive segments left to right', () => {
    const matcher = buildFieldMatcher(['email', 'name']);

    expect(matcher.matches('name=Bob;email=bob@x.io;ip=10.0.0.1;')).toEqual([
      { field: 'name', value: 'Bob', index: 0 },
      { field: 'email', value: 'bob@x.io', index: 9 },
    ]);
  });

  it('never matches with an empty field set', () => {
    const matcher = buildFieldMatcher([]);

    expect(matcher.test('name=Bob;')).toBe(false);
    expect(matcher.matches('name=Bob;')).toEqual([]);
    expect(matcher.replace('name=Bob;', () => '***')).toBe('name=Bob;');
  });

  it('does not match a field name that ends a longer key', () => {
    const matcher = buildFieldMatcher(['name']);

    expect(matcher.test('notname=secret;')).toBe(false);
    expect(matcher.test('ip=1;username=bob;')).toBe(false);
  });

  it('does not match a longer key that starts with a field name', () => {
    expect(buildFieldMatcher(['name']).test('names=a,b;')).toBe(false);
  });

  it('matches field names case-sensitively', () => {
    const matcher = buildFieldMatcher(['name']);

    expect(matcher.test('Name=Bob;')).toBe(false);
    expect(matcher.test('name=Bob;')).toBe(true);
  });

  it('takes the value up to the end of the line when no separator follows', () => {
    expect(buildFieldMatcher(['ssn']).matches('ip=1;ssn=123-45-6789')).toEqual([
      { field: 'ssn', value: '123-45-6789', index: 5 },
    ]);
  });

  it('honours a custom separator and assignment', () => {
    const matcher = buildFieldMatcher(['name'], '|', ':');

    expect(matcher.matches('name:Bob|role:admin|')).toEqual([{ field: 'name', value: 'Bob', index: 0 }]);
    expect(matcher.test('name=Bob;')).toBe(false);
  });

  it('treats regex metacharacters in field names literally', () => {
    const matcher = buildFieldMatcher(['user.name']);

    expect(matcher.matches('userXname=1;user.name=2;')).toEqual([{ field: 'user.name', value: '2', index: 12 }]);
  });

  it('accepts a segment that starts after whitespace', () => {
    const matcher = buildFieldMatcher(PII_FIELDS);

    expect(matcher.matches('[USER_DATA] user_data INFO t: name=Bob; email=x;').map(m => m.value)).toEqual([
      'Bob',
      'x',
    ]);
  });

  it('only treats whitespace as a boundary in leading text without an assignment', () => {
    const matcher = buildFieldMatcher(PII_FIELDS);

    expect(matcher.matches('user logged in name=Bob;')).toEqual([{ field: 'name', value: 'Bob', index: 15 }]);
    expect(matcher.test('note=call name=Bob;')).toBe(false);
    expect(matcher.test('a|b name=Bob;')).toBe(true);
    expect(buildFieldMatcher(['name'], '|').test('a|b name=Bob|')).toBe(false);
  });

  it('passes each match to the replacer and keeps the surrounding text', () => {
    const matcher = buildFieldMatcher(['ssn', 'phone']);
    const replacer = vi.fn((match: { value: string }) => `<${match.value.length}>`);

    expect(matcher.replace('ssn=123;ip=1;phone=55;', replacer)).toBe('ssn=<3>;ip=1;phone=<2>;');
    expect(replacer).toHaveBeenCalledTimes(2);
    expect(replacer).toHaveBeenNthCalledWith(1, { field: 'ssn', value: '123', index: 0 });
    expect(replacer).toHaveBeenNthCalledWith(2, { field: 'phone', value: '55', index: 13 });
  });

  it('is frozen and drops duplicate field names', () => {
    const matcher = buildFieldMatcher(['a', 'a', 'b']);

    expect(Object.isFrozen(matcher)).toBe(true);
    expect(matcher.fields).toEqual(['a', 'b']);
    expect(matcher.separator).toBe(';');
    expect(matcher.assignment).toBe('=');
  });

  it('gives the same answer on repeated calls', () => {
    const matcher = buildFieldMatcher(['email']);
    const message = 'email=a@b.c;';

    expect(matcher.test(message)).toBe(true);
    expect(matcher.test(message)).toBe(true);
    expect(matcher.matches(message)).toHaveLength(1);
    expect(matcher.matches(message)).toHaveLength(1);
  });
});
