import { describe, it, expect, vi, afterEach } from 'vitest';
import { resolve } from 'node:path';
import { TermDictionary, loadDictionary } from '../../src/comments/dictionary.js';

const FIXTURE_DICTIONARY = resolve('fixtures/dictionary.json');

describe('TermDictionary', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('looks up initializer values exactly after trimming', () => {
    const dict = new TermDictionary([['0x80', 'High bit']]);
    expect(dict.lookupValue(' 0x80 ')).toBe('High bit');
    expect(dict.lookupValue('0x8')).toBeNull();
  });

  it('prefers the longest term contained in a name', () => {
    const dict = new TermDictionary([
      ['pos', 'Position'],
      ['position', 'Full position'],
    ]);
    expect(dict.lookupName('position_x')).toBe('Full position');
    expect(dict.lookupName('last_pos')).toBe('Position');
  });

  it('matches short terms only as whole names or underscore parts', () => {
    const dict = new TermDictionary([['id', 'Identifier']]);
    expect(dict.lookupName('id')).toBe('Identifier');
    expect(dict.lookupName('node_id')).toBe('Identifier');
    expect(dict.lookupName('ID_FIELD')).toBe('Identifier');
    expect(dict.lookupName('video')).toBeNull();
  });

  it('never matches names against numeric keys', () => {
    const dict = new TermDictionary([['64', 'Sixty-four']]);
    expect(dict.lookupName('buf64')).toBeNull();
    expect(dict.lookupValue('64')).toBe('Sixty-four');
  });

  it('rejects JSON that is not an object', () => {
    expect(() => TermDictionary.fromJson(['a'])).toThrow('Dictionary must be a JSON object');
    expect(() => TermDictionary.fromJson('a')).toThrow('Dictionary must be a JSON object');
  });

  it('loads a dictionary file and skips non-string values', async () => {
    const dict = await loadDictionary(FIXTURE_DICTIONARY);

    expect(dict.size).toBe(4);
    expect(dict.lookupValue('0xFF')).toBe('Full byte mask');
    expect(dict.lookupName('max_retries')).toBe('Retry counter');
    expect(dict.lookupName('count')).toBeNull();
  });

  it('returns an empty dictionary when no path is given', async () => {
    expect((await loadDictionary(null)).size).toBe(0);
  });

  it('reports an unreadable file and continues with an empty dictionary', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const dict = await loadDictionary(resolve('fixtures/no-such-dictionary.json'));

    expect(dict.size).toBe(0);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0][0])).toContain('[declscan] Error loading dictionary');
  });
});
