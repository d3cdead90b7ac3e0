import { describe, it, expect } from 'vitest';
import { isValidUrl, joinUrl } from './url.js';

describe('joinUrl', () => {
  it('joins base and endpoint with a single slash', () => {
    expect(joinUrl('https://api.example.test/v2/', '/users')).toBe('https://api.example.test/v2/users');
    expect(joinUrl('https://api.example.test/v2', 'users')).toBe('https://api.example.test/v2/users');
  });

  it('uses the base alone for an empty endpoint', () => {
    expect(joinUrl('https://api.example.test/v2', '')).toBe('https://api.example.test/v2');
    expect(joinUrl('https://api.example.test', '')).toBe('https://api.example.test/');
  });

  it('appends query parameters, repeating array keys and skipping empty values', () => {
    expect(
      joinUrl('https://api.example.test', '/search', {
        q: 'rest api',
        page: 2,
        tag: ['a', 'b'],
        archived: false,
        cursor: undefined,
        owner: null,
      }),
    ).toBe('https://api.example.test/search?q=rest+api&page=2&tag=a&tag=b&archived=false');
  });

  it('keeps a query already present on the endpoint', () => {
    expect(joinUrl('https://api.example.test', '/items?sort=name', { limit: 10 })).toBe(
      'https://api.example.test/items?sort=name&limit=10',
    );
  });

  it('lets an absolute endpoint replace the base', () => {
    expect(joinUrl('https://api.example.test', 'https://auth.example.test/token')).toBe(
      'https://auth.example.test/token',
    );
  });
});

describe('isValidUrl', () => {
  it('accepts absolute URLs only', () => {
    expect(isValidUrl('https://api.example.test/users')).toBe(true);
    expect(isValidUrl('/users')).toBe(false);
    expect(isValidUrl('not a url')).toBe(false);
  });
});
