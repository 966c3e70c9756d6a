import { describe, expect, it } from 'vitest';
import { Option } from 'effect';
import { HttpHeaders } from '../../../lib/Http/HttpHeaders.js';

describe('HttpHeaders', () => {
  it('should look up names case-insensitively', () => {
    const headers = HttpHeaders.from({ 'Content-Type': 'text/html' });
    expect(headers.get('content-type')).toEqual(Option.some('text/html'));
    expect(headers.has('CONTENT-TYPE')).toBe(true);
    expect(headers.get('Location')).toEqual(Option.none());
  });

  it('should keep every value of a repeated header in order', () => {
    const headers = HttpHeaders.from([
      ['Set-Cookie', 'a=1'],
      ['X-Other', 'x'],
      ['set-cookie', 'b=2'],
    ]);
    expect(headers.getAll('Set-Cookie')).toEqual(['a=1', 'b=2']);
    expect(headers.size).toBe(3);
  });

  it('should expand array values of a record', () => {
    const headers = HttpHeaders.from({ 'Set-Cookie': ['a=1', 'b=2'] });
    expect(headers.entries()).toEqual([
      ['Set-Cookie', 'a=1'],
      ['Set-Cookie', 'b=2'],
    ]);
  });

  it('should return new maps from edits', () => {
    const original = HttpHeaders.from({ Accept: 'text/html' });
    const edited = original.set('accept', 'application/json').append('X-Trace', '1');

    expect(original.get('Accept')).toEqual(Option.some('text/html'));
    expect(edited.getAll('Accept')).toEqual(['application/json']);
    expect(edited.get('x-trace')).toEqual(Option.some('1'));
  });

  it('should return the same map when deleting a missing name', () => {
    const headers = HttpHeaders.from({ Accept: 'text/html' });
    expect(headers.delete('Cookie')).toBe(headers);
    expect(headers.delete('ACCEPT').size).toBe(0);
  });

  it('should join repeated values in a record under the first casing', () => {
    const headers = HttpHeaders.from([
      ['Vary', 'Accept'],
      ['vary', 'Cookie'],
    ]);
    expect(headers.toRecord()).toEqual({ Vary: 'Accept, Cookie' });
  });

  it('should reuse an existing map', () => {
    const headers = HttpHeaders.from({ Accept: '*/*' });
    expect(HttpHeaders.from(headers)).toBe(headers);
    expect(HttpHeaders.from()).toBe(HttpHeaders.empty);
  });
});
