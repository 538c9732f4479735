import { describe, it, expect } from 'vitest';
import { buildQueryString, normalizeBaseUrl, withQuery } from '../src/utils.js';

describe('Utils', () => {
  describe('buildQueryString', () => {
    it('should keep insertion order and repeat array keys', () => {
      expect(buildQueryString({ status: 'pending', tags: ['a', 'b'], user_id: 'u1' })).toBe(
        'status=pending&tags=a&tags=b&user_id=u1'
      );
    });

    it('should skip null values', () => {
      expect(buildQueryString({ parent_id: null, limit: 20 })).toBe('limit=20');
    });

    it('should stringify numbers and booleans', () => {
      expect(buildQueryString({ offset: 0, include_deleted: false })).toBe(
        'offset=0&include_deleted=false'
      );
    });

    it('should send nested objects as JSON', () => {
      expect(buildQueryString({ filter: { x: 1 } })).toBe('filter=%7B%22x%22%3A1%7D');
    });

    it('should form-encode special characters', () => {
      expect(buildQueryString({ keyword: 'a b&c' })).toBe('keyword=a+b%26c');
    });

    it('should return an empty string for an empty query', () => {
      expect(buildQueryString({})).toBe('');
    });
  });

  describe('withQuery', () => {
    it('should leave the path alone without a query', () => {
      expect(withQuery('tasks/', {})).toBe('tasks/');
    });

    it('should append the query string', () => {
      expect(withQuery('tasks/', { user_id: 'u1' })).toBe('tasks/?user_id=u1');
    });
  });

  describe('normalizeBaseUrl', () => {
    it('should strip trailing slashes', () => {
      expect(normalizeBaseUrl('http://task-service:20253///')).toBe('http://task-service:20253');
    });

    it('should strip an /api/v1 suffix', () => {
      expect(normalizeBaseUrl('http://task-service:20253/api/v1')).toBe(
        'http://task-service:20253'
      );
      expect(normalizeBaseUrl('http://task-service:20253/api/v1/')).toBe(
        'http://task-service:20253'
      );
    });

    it('should keep other paths', () => {
      expect(normalizeBaseUrl('http://gateway/tasks-svc')).toBe('http://gateway/tasks-svc');
    });
  });
});
