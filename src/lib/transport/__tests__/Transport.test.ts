/**
 * Tests for URL joining and location parsing
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from '@jest/globals';
import { extractResourceId, joinUrl } from '../Transport';

describe('joinUrl', () => {
  it('should not double slashes', () => {
    expect(joinUrl('https://server.test/', '/edev')).toBe('https://server.test/edev');
    expect(joinUrl('https://server.test/api//', 'edev/1/di')).toBe('https://server.test/api/edev/1/di');
  });
});

describe('extractResourceId', () => {
  it('should return the trailing id for a path under the collection', () => {
    expect(extractResourceId('/edev/4', '/edev')).toBe('4');
    expect(extractResourceId('/edev/4/der/1', '/edev/4/der')).toBe('1');
  });

  it('should accept absolute URLs and mounted base paths', () => {
    expect(extractResourceId('https://server.test/api/edev/12', '/edev')).toBe('12');
    expect(extractResourceId('/edev/12/', '/edev')).toBe('12');
  });

  it('should reject locations outside the collection', () => {
    expect(extractResourceId('/mock/location/1', '/edev')).toBeUndefined();
    expect(extractResourceId('/xedev/1', '/edev')).toBeUndefined();
    expect(extractResourceId('/edev/4/der/1', '/edev')).toBeUndefined();
  });

  it('should reject missing or empty locations', () => {
    expect(extractResourceId(undefined, '/edev')).toBeUndefined();
    expect(extractResourceId('', '/edev')).toBeUndefined();
    expect(extractResourceId('/edev', '/edev')).toBeUndefined();
  });
});
