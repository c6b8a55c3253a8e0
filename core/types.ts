import type { LessonSnapshot, WordSnapshot } from '../types/messages';

export interface LessonRow {
  id: number;
  main_name: string;
  sub_name: string;
}

export interface WordRow {
  id: number;
  lesson_id: number;
  kana: string;
  translation: string;
  romaji: string | null;
  example_sentence: string | null;
}

export interface TagRow {
  id: number;
  word_id: number;
  tag: string;
}

// Domain records share the shape of the snapshots handed to the presentation layer.
export type Word = WordSnapshot;
export type Lesson = LessonSnapshot;

/** Sentinel returned by store writes that failed. */
export const FAILED_ID = -1;

export function createWord(fields: Partial<Word> = {}): Word {
  return {
    id: fields.id ?? 0,
    kana: fields.kana ?? '',
    translation: fields.translation ?? '',
    romaji: fields.romaji ?? '',
    exampleSentence: fields.exampleSentence ?? '',
    tags: fields.tags ? [...fields.tags] : [],
  };
}

export function createLesson(fields: Partial<Lesson> = {}): Lesson {
  return {
    id: fields.id ?? 0,
    mainName: fields.mainName ?? '',
    subName: fields.subName ?? '',
    words: fields.words ? fields.words.map((word) => createWord(word)) : [],
  };
}

export function wordsEqual(a: Word, b: Word): boolean {
  return (
    a.id === b.id &&
    a.kana === b.kana &&
    a.translation === b.translation &&
    a.romaji === b.romaji &&
    a.exampleSentence === b.exampleSentence &&
    a.tags.length === b.tags.length &&
    a.tags.every((tag, index) => tag === b.tags[index])
  );
}

export function formatLessonName(lesson: Pick<Lesson, 'mainName' | 'subName'>): string {
  return `${lesson.mainName} - ${lesson.subName}`;
}

export function rowToWord(row: WordRow, tags: string[]): Word {
  return {
    id: row.id,
    kana: row.kana,
    translation: row.translation,
    romaji: row.romaji ?? '',
    exampleSentence: row.example_sentence ?? '',
    tags,
  };
}
