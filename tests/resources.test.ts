import { describe, it, expect } from 'vitest';
import { findResource, readResource, RESOURCES } from '../src/domain/dealer/resources.js';

describe('RESOURCES', () => {
  it('exposes the four fraud:// documents', () => {
    expect(RESOURCES.map((r) => r.uri)).toEqual([
      'fraud://sources/search-strategy',
      'fraud://sources/indicators',
      'fraud://guide/usage',
      'fraud://legal/disclaimer',
    ]);
  });
});

describe('findResource', () => {
  it('finds by URI', () => {
    expect(findResource('fraud://guide/usage')?.file).toBe('usage.md');
  });

  it('returns undefined for an unknown URI', () => {
    expect(findResource('fraud://nope')).toBeUndefined();
  });
});

describe('readResource', () => {
  it('reads every document from disk', async () => {
    for (const resource of RESOURCES) {
      const { entry, text } = await readResource(resource.uri);
      expect(entry).toBe(resource);
      expect(text.length).toBeGreaterThan(0);
    }
  });

  it('rejects an unknown URI', async () => {
    await expect(readResource('fraud://nope')).rejects.toThrow('Resource not found: fraud://nope');
  });
});
