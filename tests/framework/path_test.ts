/**
 * Path Normalization Tests
 */

import { expect, test } from 'vitest';

import {
  joinPaths,
  matchesPrefix,
  normalizePath,
  pathAfterPrefix,
} from '../../framework/router/path.ts';

test('normalizePath - empty path is root', () => {
  expect(normalizePath('')).toBe('/');
});

test('normalizePath - adds leading slash and drops trailing slash', () => {
  expect(normalizePath('a/b/')).toBe('/a/b');
  expect(normalizePath('/a/b')).toBe('/a/b');
  expect(normalizePath('/')).toBe('/');
});

test('normalizePath - drops repeated trailing slashes', () => {
  expect(normalizePath('/a//')).toBe('/a');
  expect(normalizePath('//')).toBe('/');
});

test('normalizePath - is idempotent', () => {
  for (const input of ['', '/', 'a', 'a/b/', '/a/b', '/a//', 'users/', '//x//']) {
    const once = normalizePath(input);
    expect(normalizePath(once)).toBe(once);
  }
});

test('joinPaths - root prefix contributes nothing', () => {
  expect(joinPaths('/', '/x')).toBe('/x');
  expect(joinPaths('', 'x')).toBe('/x');
});

test('joinPaths - concatenates normalized parts', () => {
  expect(joinPaths('/api', '/users')).toBe('/api/users');
  expect(joinPaths('api/', 'users/')).toBe('/api/users');
  expect(joinPaths('/api', '/')).toBe('/api');
});

test('matchesPrefix - respects segment boundaries', () => {
  expect(matchesPrefix('/static', '/static')).toBe(true);
  expect(matchesPrefix('/static/', '/static')).toBe(true);
  expect(matchesPrefix('/static/css/site.css', '/static')).toBe(true);
  expect(matchesPrefix('/staticfile', '/static')).toBe(false);
  expect(matchesPrefix('/other', '/static')).toBe(false);
  expect(matchesPrefix('/anything', '/')).toBe(true);
});

test('pathAfterPrefix - returns the remainder', () => {
  expect(pathAfterPrefix('/static/a.css', '/static')).toBe('/a.css');
  expect(pathAfterPrefix('/static', '/static')).toBe('/');
  expect(pathAfterPrefix('/static/', '/static')).toBe('/');
  expect(pathAfterPrefix('/a.css', '/')).toBe('/a.css');
});
