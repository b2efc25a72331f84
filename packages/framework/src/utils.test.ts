import { test, expect, describe } from 'vitest';
import { normalizePath } from './utils';

describe('normalizePath', () => {
  test('keeps the root path', () => {
    expect(normalizePath('/')).toBe('/');
  });

  test('adds a leading slash', () => {
    expect(normalizePath('about')).toBe('/about');
  });

  test('removes trailing slashes', () => {
    expect(normalizePath('/api/v1/posts/')).toBe('/api/v1/posts');
    expect(normalizePath('/page//')).toBe('/page');
  });

  test('empty path is the root path', () => {
    expect(normalizePath('')).toBe('/');
  });
});
