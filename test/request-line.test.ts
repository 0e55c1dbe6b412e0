import { describe, it, expect } from 'vitest';
import {
  countQueryKeys,
  splitRequest,
} from '../src/services/parser/request-line.js';

describe('splitRequest', () => {
  it('splits method, uri, path, query and protocol', () => {
    expect(splitRequest('GET /a/b?x=1&y=2 HTTP/2.0')).toEqual({
      method: 'GET',
      uri: '/a/b?x=1&y=2',
      path: '/a/b',
      query: 'x=1&y=2',
      proto: 'HTTP/2.0',
    });
  });

  it('keeps the uri as path when there is no query', () => {
    expect(splitRequest('HEAD /plain HTTP/1.1')).toMatchObject({
      path: '/plain',
      query: '',
    });
  });

  it('takes path and query from absolute urls', () => {
    const parts = splitRequest(
      'GET http://example.test:8080/p/q;v=1?z=9#frag HTTP/1.1',
    );
    expect(parts.uri).toBe('http://example.test:8080/p/q;v=1?z=9#frag');
    expect(parts.path).toBe('/p/q');
    expect(parts.query).toBe('z=9');
  });

  it('splits relative uris whose query holds a url', () => {
    expect(splitRequest('GET /redirect?to=http://x.test/y HTTP/1.1')).toMatchObject({
      path: '/redirect',
      query: 'to=http://x.test/y',
    });
  });

  it('fills missing tokens with empty strings', () => {
    expect(splitRequest('')).toEqual({
      method: '',
      uri: '',
      path: '',
      query: '',
      proto: '',
    });
    expect(splitRequest('PRI')).toMatchObject({ method: 'PRI', uri: '', proto: '' });
  });
});

describe('countQueryKeys', () => {
  it('counts distinct names', () => {
    expect(countQueryKeys('a=1&b=2&a=3')).toBe(2);
  });

  it('ignores blank values and bare names', () => {
    expect(countQueryKeys('a=&b=1')).toBe(1);
    expect(countQueryKeys('flag&x=1')).toBe(1);
    expect(countQueryKeys('&&')).toBe(0);
    expect(countQueryKeys('')).toBe(0);
  });

  it('decodes names before comparing them', () => {
    expect(countQueryKeys('first+name=x&first%20name=y')).toBe(1);
  });

  it('keeps malformed escapes verbatim', () => {
    expect(countQueryKeys('%E0%A4%A=1&%E0%A4%A=2')).toBe(1);
    expect(countQueryKeys('100%=1&100%25=2')).toBe(1);
  });

  it('replaces invalid UTF-8 escapes with U+FFFD', () => {
    expect(countQueryKeys('a%ff=1&a%fe=1')).toBe(1);
    expect(countQueryKeys('caf%C3%A9=1&caf%C3=1')).toBe(2);
  });
});
