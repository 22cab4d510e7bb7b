// tests/unit/RaindropTransformer.test.ts

import { describe, it, expect } from 'vitest';
import {
  buildFolder,
  buildNote,
  formatTags,
  quoteAnnotation,
  toRaindropRow,
} from '../../src/core/transformer/RaindropTransformer';
import { makeBookmark } from '../helpers/fixtures';

function countOccurrences(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

describe('RaindropTransformer', () => {
  describe('buildFolder', () => {
    it('should use the root folder when no flag is set', () => {
      expect(buildFolder({ readLater: false, private: false })).toBe('Diigo Import');
    });

    it('should append Read Later for read-later bookmarks', () => {
      expect(buildFolder({ readLater: true, private: false })).toBe('Diigo Import/Read Later');
    });

    it('should append Private for private bookmarks', () => {
      expect(buildFolder({ readLater: false, private: true })).toBe('Diigo Import/Private');
    });

    it('should put Read Later before Private when both apply', () => {
      expect(buildFolder({ readLater: true, private: true })).toBe('Diigo Import/Read Later/Private');
    });
  });

  describe('formatTags', () => {
    it('should render no tags as an empty string', () => {
      expect(formatTags([])).toBe('');
    });

    it('should render a single tag bare', () => {
      expect(formatTags(['a'])).toBe('a');
    });

    it('should join several tags and wrap them in quotes', () => {
      expect(formatTags(['a', 'b'])).toBe('"a, b"');
      expect(formatTags(['typescript', 'tools', 'web'])).toBe('"typescript, tools, web"');
    });

    it('should double quotes inside a single tag and wrap it', () => {
      expect(formatTags(['say "hi"'])).toBe('"say ""hi"""');
    });

    it('should double quotes inside one of several tags', () => {
      expect(formatTags(['x', 'a"b'])).toBe('"x, a""b"');
    });

    it('should keep tags as received, without trimming', () => {
      expect(formatTags([' padded', 'tag '])).toBe('" padded, tag "');
    });
  });

  describe('quoteAnnotation', () => {
    it('should prefix the annotation with a quote marker', () => {
      expect(quoteAnnotation('Key point')).toBe('>Key point');
    });

    it('should continue the marker across blank lines', () => {
      expect(quoteAnnotation('first\n\nsecond')).toBe('>first\n> \nsecond');
    });

    it('should leave single line breaks alone', () => {
      expect(quoteAnnotation('line1\nline2')).toBe('>line1\nline2');
    });
  });

  describe('buildNote', () => {
    it('should be exactly the description without annotations', () => {
      const bookmark = makeBookmark({ description: 'Just a description' });

      expect(buildNote(bookmark)).toBe('Just a description');
    });

    it('should repeat the quoted annotation for every comment', () => {
      const bookmark = makeBookmark({
        description: 'Desc',
        annotations: new Map([['Key point', ['c1', 'c2']]]),
      });

      const note = buildNote(bookmark);

      expect(note).toBe('Desc\n\nAnnotations:\n >Key point\n\nc1\n\n >Key point\n\nc2\n');
      expect(countOccurrences(note, 'Annotations:')).toBe(1);
      expect(countOccurrences(note, '>Key point')).toBe(2);
    });

    it('should follow annotation order, then comment order', () => {
      const bookmark = makeBookmark({
        description: '',
        annotations: new Map([
          ['B first', ['one']],
          ['A second', ['two', 'three']],
        ]),
      });

      expect(buildNote(bookmark)).toBe(
        '\n\nAnnotations:' +
          '\n >B first\n\none\n' +
          '\n >A second\n\ntwo\n' +
          '\n >A second\n\nthree\n'
      );
    });

    it('should emit only the header for an annotation without comments', () => {
      const bookmark = makeBookmark({
        description: 'Desc',
        annotations: new Map([['Lonely highlight', []]]),
      });

      expect(buildNote(bookmark)).toBe('Desc\n\nAnnotations:');
    });

    it('should quote multi-paragraph annotations', () => {
      const bookmark = makeBookmark({
        description: 'Desc',
        annotations: new Map([['Para one\n\nPara two', ['Agreed']]]),
      });

      expect(buildNote(bookmark)).toBe('Desc\n\nAnnotations:\n >Para one\n> \nPara two\n\nAgreed\n');
    });
  });

  describe('toRaindropRow', () => {
    it('should map every column', () => {
      const bookmark = makeBookmark({
        url: 'https://example.com/post',
        title: 'A post',
        description: 'Worth reading',
        tags: ['typescript', 'tools'],
        readLater: true,
        private: true,
      });

      expect(toRaindropRow(bookmark)).toEqual({
        url: 'https://example.com/post',
        folder: 'Diigo Import/Read Later/Private',
        title: 'A post',
        note: 'Worth reading',
        tags: '"typescript, tools"',
        created: '2024-11-14T05:48:28+00:00',
      });
    });

    it('should render the creation time in its own offset', () => {
      const bookmark = makeBookmark({
        createdAt: { epochMs: Date.UTC(2023, 11, 31, 19, 0, 0), offsetMinutes: 330 },
      });

      expect(toRaindropRow(bookmark).created).toBe('2024-01-01T00:30:00+05:30');
    });
  });
});
