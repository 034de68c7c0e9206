import { describe, it, expect } from 'vitest';
import { extractTags, mergeTags } from '../../src/parsers/hashtag-parser.js';

describe('extractTags', () => {
  it('extracts a single tag', () => {
    expect(extractTags('Website update #webdev')).toEqual({ cleanTitle: 'Website update', tags: ['webdev'] });
  });

  it('extracts tags in order of appearance', () => {
    const { cleanTitle, tags } = extractTags('Website #webdev redesign #design #urgent');
    expect(cleanTitle).toBe('Website redesign');
    expect(tags).toEqual(['webdev', 'design', 'urgent']);
  });

  it('leaves titles without tags unchanged', () => {
    expect(extractTags('Simple task without tags')).toEqual({ cleanTitle: 'Simple task without tags', tags: [] });
  });

  it('handles an empty title', () => {
    expect(extractTags('')).toEqual({ cleanTitle: '', tags: [] });
  });

  it('trims surrounding whitespace', () => {
    expect(extractTags('  Task   #tag1    #tag2   #tag3  ')).toEqual({ cleanTitle: 'Task', tags: ['tag1', 'tag2', 'tag3'] });
  });

  it('returns an empty clean title for tag-only titles', () => {
    expect(extractTags('#inbox #later')).toEqual({ cleanTitle: '', tags: ['inbox', 'later'] });
  });

  it('accepts non-ASCII letters, digits and underscores', () => {
    expect(extractTags('Büro aufräumen #Büro #q3_plan #2025').tags).toEqual(['Büro', 'q3_plan', '2025']);
  });

  it('ignores a lone hash', () => {
    expect(extractTags('Learn C# today')).toEqual({ cleanTitle: 'Learn C# today', tags: [] });
  });

  it('removes a tag glued to a word', () => {
    expect(extractTags('Fix bug#123 now')).toEqual({ cleanTitle: 'Fix bug now', tags: ['123'] });
  });

  it('keeps the remaining words in order', () => {
    const { cleanTitle } = extractTags('Call #phone mom about #family dinner');
    expect(cleanTitle).toBe('Call mom about dinner');
  });
});

describe('mergeTags', () => {
  it('puts title tags before native tags', () => {
    expect(mergeTags(['webdev', 'urgent'], ['development', 'project'])).toEqual(['webdev', 'urgent', 'development', 'project']);
  });

  it('removes case-insensitive duplicates keeping the first spelling', () => {
    expect(mergeTags(['Dev'], ['dev', 'OPS'])).toEqual(['Dev', 'OPS']);
    expect(mergeTags(['webdev', 'urgent'], ['WebDev', 'development', 'URGENT', 'project']))
      .toEqual(['webdev', 'urgent', 'development', 'project']);
  });

  it('removes duplicates within one list', () => {
    expect(mergeTags(['a', 'A', 'b'], [])).toEqual(['a', 'b']);
  });

  it('handles empty lists', () => {
    expect(mergeTags([], [])).toEqual([]);
    expect(mergeTags(['webdev', 'urgent'], [])).toEqual(['webdev', 'urgent']);
    expect(mergeTags([], ['webdev', 'urgent'])).toEqual(['webdev', 'urgent']);
  });

  it('is idempotent', () => {
    const merged = mergeTags(['Dev', 'ops'], ['dev', 'OPS', 'qa']);
    expect(mergeTags(merged, merged)).toEqual(merged);
    expect(mergeTags(merged, [])).toEqual(merged);
  });
});
