import { describe, it, expect } from 'vitest';
import {
  HOP_BY_HOP_HEADERS,
  appendForwardedFor,
  appendHeader,
  deleteHeader,
  getHeader,
  headerMapFromRaw,
  removeConnectionHeaders,
  removeHopHeaders,
  sanitizeHopByHopHeaders,
  setHeader,
  toOutgoingHeaders,
} from './headers.js';
import type { HeaderMap } from './types.js';

describe('headerMapFromRaw', () => {
  it('should key headers by lower-cased name and keep repeated values in order', () => {
    const headers = headerMapFromRaw(['Accept', 'text/html', 'X-Trace', 'a', 'x-trace', 'b']);

    expect(headers.get('accept')).toEqual(['text/html']);
    expect(headers.get('x-trace')).toEqual(['a', 'b']);
    expect(headers.size).toBe(2);
  });

  it('should ignore a trailing name without value', () => {
    const headers = headerMapFromRaw(['Accept', '*/*', 'Dangling']);
    expect([...headers.keys()]).toEqual(['accept']);
  });
});

describe('toOutgoingHeaders', () => {
  it('should keep single values as strings and repeated ones as arrays', () => {
    const headers: HeaderMap = new Map([
      ['content-type', ['text/plain']],
      ['set-cookie', ['a=1', 'b=2']],
      ['empty', []],
    ]);

    expect(toOutgoingHeaders(headers)).toEqual({
      'content-type': 'text/plain',
      'set-cookie': ['a=1', 'b=2'],
    });
  });
});

describe('header access', () => {
  it('should look up and mutate headers case-insensitively', () => {
    const headers: HeaderMap = new Map();

    setHeader(headers, 'X-Custom', 'one');
    appendHeader(headers, 'x-CUSTOM', 'two');
    expect(getHeader(headers, 'X-Custom')).toEqual(['one', 'two']);

    setHeader(headers, ' x-custom ', 'three');
    expect(getHeader(headers, 'x-custom')).toEqual(['three']);

    deleteHeader(headers, 'X-CUSTOM');
    expect(getHeader(headers, 'x-custom')).toBeUndefined();
  });
});

describe('removeHopHeaders', () => {
  it('should remove all nine hop-by-hop headers whatever their casing', () => {
    const raw = [
      'Connection', 'close',
      'Proxy-Connection', 'keep-alive',
      'KEEP-ALIVE', 'timeout=5',
      'Proxy-Authenticate', 'Basic',
      'proxy-authorization', 'Basic dGVzdDp0ZXN0',
      'TE', 'trailers',
      'Trailer', 'Expires',
      'Transfer-Encoding', 'chunked',
      'Upgrade', 'websocket',
      'Accept', '*/*',
    ];
    const headers = headerMapFromRaw(raw);

    removeHopHeaders(headers);

    expect([...headers.keys()]).toEqual(['accept']);
    expect(HOP_BY_HOP_HEADERS).toHaveLength(9);
  });
});

describe('removeConnectionHeaders', () => {
  it('should remove every header the Connection header names', () => {
    const headers = headerMapFromRaw([
      'Connection', 'X-Foo, x-bar',
      'X-Foo', '1',
      'X-Bar', '2',
      'X-Baz', '3',
    ]);

    removeConnectionHeaders(headers);

    expect(headers.has('x-foo')).toBe(false);
    expect(headers.has('x-bar')).toBe(false);
    expect(getHeader(headers, 'x-baz')).toEqual(['3']);
  });

  it('should skip empty tokens', () => {
    const headers = headerMapFromRaw(['Connection', ' , X-Foo ,,', 'X-Foo', '1', 'Accept', '*/*']);

    removeConnectionHeaders(headers);

    expect(headers.has('x-foo')).toBe(false);
    expect(getHeader(headers, 'accept')).toEqual(['*/*']);
  });

  it('should read tokens from every Connection value', () => {
    const headers = headerMapFromRaw(['Connection', 'X-A', 'Connection', 'X-B', 'X-A', '1', 'X-B', '2']);

    removeConnectionHeaders(headers);

    expect(headers.has('x-a')).toBe(false);
    expect(headers.has('x-b')).toBe(false);
  });
});

describe('sanitizeHopByHopHeaders', () => {
  it('should remove Connection-named headers before dropping Connection itself', () => {
    const headers = headerMapFromRaw([
      'Connection', 'keep-alive, X-Session-Hint',
      'Keep-Alive', 'timeout=5',
      'X-Session-Hint', 'abc',
      'Content-Type', 'application/json',
    ]);

    const result = sanitizeHopByHopHeaders(headers);

    expect(result).toBe(headers);
    expect([...headers.keys()]).toEqual(['content-type']);
  });

  it('should leave end-to-end headers untouched', () => {
    const headers = headerMapFromRaw(['Cache-Control', 'no-cache', 'Set-Cookie', 'a=1', 'Set-Cookie', 'b=2']);

    sanitizeHopByHopHeaders(headers);

    expect(getHeader(headers, 'cache-control')).toEqual(['no-cache']);
    expect(getHeader(headers, 'set-cookie')).toEqual(['a=1', 'b=2']);
  });
});

describe('appendForwardedFor', () => {
  it('should set the caller IP when no prior value exists', () => {
    const headers: HeaderMap = new Map();
    appendForwardedFor(headers, '10.0.0.1');
    expect(getHeader(headers, 'X-Forwarded-For')).toEqual(['10.0.0.1']);
  });

  it('should fold prior values and append the caller IP last', () => {
    const headers = headerMapFromRaw([
      'X-Forwarded-For', '192.0.2.1',
      'x-forwarded-for', '198.51.100.7, 203.0.113.9',
    ]);

    appendForwardedFor(headers, '10.0.0.1');

    expect(getHeader(headers, 'x-forwarded-for')).toEqual(['192.0.2.1, 198.51.100.7, 203.0.113.9, 10.0.0.1']);
  });
});
