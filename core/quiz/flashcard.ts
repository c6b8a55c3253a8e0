import type { Lesson, Word } from '../types';
import type { WordType } from '../../types/messages';

export interface Flashcard {
  word: Word;
  lessonId: number;
  badAttempts: number;
  goodAttempts: number;
  learned: boolean;
}

export function createFlashcard(word: Word, lessonId: number): Flashcard {
  return { word, lessonId, badAttempts: 0, goodAttempts: 0, learned: false };
}

export function flashcardsFromLessons(lessons: readonly Lesson[]): Flashcard[] {
  return lessons.flatMap((lesson) => lesson.words.map((word) => createFlashcard(word, lesson.id)));
}

export function resolveWordField(word: Word, type: WordType): string {
  switch (type) {
    case 'base-word':
      return word.translation;
    case 'kana':
      return word.kana;
    case 'romaji':
      return word.romaji;
  }
}
