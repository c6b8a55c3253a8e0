import { describe, expect, it } from 'vitest';
import { createWord, formatLessonName, rowToWord, wordsEqual } from '../types';

describe('domain records', () => {
  it('compares words field by field, tags in order', () => {
    const word = createWord({ id: 1, kana: 'はな', translation: 'flower', tags: ['plant', 'noun'] });

    expect(wordsEqual(word, createWord(word))).toBe(true);
    expect(wordsEqual(word, createWord({ ...word, tags: ['noun', 'plant'] }))).toBe(false);
    expect(wordsEqual(word, createWord({ ...word, romaji: 'hana' }))).toBe(false);
  });

  it('copies tag lists instead of sharing them', () => {
    const tags = ['a'];
    const word = createWord({ tags });
    tags.push('b');

    expect(word.tags).toEqual(['a']);
  });

  it('formats display names and maps rows', () => {
    expect(formatLessonName({ mainName: 'Genki', subName: 'Lesson 3' })).toBe('Genki - Lesson 3');
    expect(
      rowToWord({ id: 5, lesson_id: 1, kana: 'かさ', translation: 'umbrella', romaji: null, example_sentence: null }, [
        'item',
      ]),
    ).toEqual({ id: 5, kana: 'かさ', translation: 'umbrella', romaji: '', exampleSentence: '', tags: ['item'] });
  });
});
