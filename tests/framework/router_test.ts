/**
 * Router Tests
 */

import { expect, test } from 'vitest';
import { Router } from '../../framework/router/router.ts';
import { compare, extract, isWildcard, stripQuery } from '../../framework/router/patterns.ts';
import { respond } from '../../framework/http/response.ts';

const ok = () => respond.text('OK');

// Pattern helpers

test('patterns - wildcard segments', () => {
  expect(isWildcard('{id}')).toBe(true);
  expect(isWildcard('id')).toBe(false);
  expect(isWildcard('{id')).toBe(false);
});

test('patterns - stripQuery drops everything from the first ?', () => {
  expect(stripQuery('/a/b?x=1?y=2')).toBe('/a/b');
  expect(stripQuery('/a/b')).toBe('/a/b');
});

test('patterns - compare requires equal segment counts', () => {
  expect(compare('/a/b', '/a/{x}')).toBe(true);
  expect(compare('/a/b/c', '/a/{x}')).toBe(false);
  expect(compare('/a', '/a/{x}')).toBe(false);
});

test('patterns - extract binds wildcards positionally', () => {
  expect(extract('/user/42/post/7', '/user/{id}/post/{pid}')).toEqual({ id: '42', pid: '7' });
});

test('patterns - extract keeps wildcard names that shadow object members', () => {
  const params = extract('/a/b', '/{__proto__}/{hasOwnProperty}');

  expect(Object.keys(params)).toEqual(['__proto__', 'hasOwnProperty']);
  expect(params['__proto__']).toBe('a');
  expect(params.hasOwnProperty).toBe('b');
  expect(extract('/a', '/{id}').constructor).toBeUndefined();
});

// Router

test('Router - basic route registration', () => {
  const router = new Router<null>();

  router.get('/test', ok);

  const match = router.find('GET', '/test');
  expect(match).not.toBeNull();
  expect(match?.params).toEqual({});
});

test('Router - extracts multiple wildcards', () => {
  const router = new Router<null>();

  router.get('/user/{id}/post/{pid}', ok);

  const match = router.find('GET', '/user/42/post/7');
  expect(match?.params).toEqual({ id: '42', pid: '7' });
});

test('Router - no match when segment counts differ', () => {
  const router = new Router<null>();

  router.get('/user/{id}', ok);
  router.get('/user/{id}/post/{pid}', ok);

  expect(router.find('GET', '/user')).toBeNull();
  expect(router.find('GET', '/user/1/post')).toBeNull();
  expect(router.find('GET', '/user/1/post/2/extra')).toBeNull();
});

test('Router - registration order decides precedence', () => {
  const router = new Router<null>();
  const wildcard = () => respond.text('wildcard');
  const literal = () => respond.text('literal');

  router.get('/a/{x}', wildcard);
  router.get('/a/b', literal);

  const match = router.find('GET', '/a/b');
  expect(match?.route.pattern).toBe('/a/{x}');
  expect(match?.handler).toBe(wildcard);
  expect(match?.params).toEqual({ x: 'b' });
});

test('Router - method must match', () => {
  const router = new Router<null>();

  router.get('/test', ok);

  expect(router.find('POST', '/test')).toBeNull();
});

test('Router - every method has its own bucket, TRACE included', () => {
  const router = new Router<null>();
  const trace = () => respond.text('trace');

  router.register('TRACE', '/t', trace);
  router.register('OPTIONS', '/t', ok);

  expect(router.find('TRACE', '/t')?.handler).toBe(trace);
  expect(router.find('OPTIONS', '/t')?.handler).toBe(ok);
  expect(router.find('HEAD', '/t')).toBeNull();
});

test('Router - query suffix is ignored when matching', () => {
  const router = new Router<null>();

  router.get('/user/{id}', ok);

  expect(router.find('GET', '/user/1?x=2')?.params).toEqual({ id: '1' });
});

test('Router - trailing slash changes the match', () => {
  const router = new Router<null>();

  router.get('/a', ok);

  expect(router.find('GET', '/a')).not.toBeNull();
  expect(router.find('GET', '/a/')).toBeNull();
});

test('Router - empty segments are literal', () => {
  const router = new Router<null>();

  router.get('/a//b', ok);

  expect(router.find('GET', '/a//b')).not.toBeNull();
  expect(router.find('GET', '/a/b')).toBeNull();
});

test('Router - 404 is an ordinary literal pattern', () => {
  const router = new Router<null>();

  router.get('404', ok);

  expect(router.find('GET', '404')).not.toBeNull();
  expect(router.find('GET', '/404')).toBeNull();
  expect(router.find('GET', '/missing')).toBeNull();
});

test('Router - parameters are not URL-decoded', () => {
  const router = new Router<null>();

  router.get('/files/{name}', ok);

  expect(router.find('GET', '/files/a%20b')?.params).toEqual({ name: 'a%20b' });
});

test('Router - duplicate registrations are kept in order', () => {
  const router = new Router<null>();
  const first = () => respond.text('first');
  const second = () => respond.text('second');

  router.get('/same', first);
  router.get('/same', second);

  expect(router.getRoutes()).toHaveLength(2);
  expect(router.find('GET', '/same')?.handler).toBe(first);
});

test('Router - getRoutes lists buckets in method order', () => {
  const router = new Router<null>();

  router.post('/x', ok);
  router.get('/b', ok);
  router.get('/a', ok);
  router.delete('/d', ok);
  router.patch('/p', ok);
  router.put('/u', ok);

  const listed = router.getRoutes().map((r) => `${r.method} ${r.pattern}`);
  expect(listed).toEqual(['GET /b', 'GET /a', 'POST /x', 'PUT /u', 'PATCH /p', 'DELETE /d']);
  expect(router.find('PUT', '/u')?.route.method).toBe('PUT');
  expect(router.find('PATCH', '/p')?.route.method).toBe('PATCH');
});
