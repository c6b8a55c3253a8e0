import type { LessonStore } from '../db';
import type { Lesson, Word } from '../types';

export type StoreCall =
  | { method: 'addLesson'; args: [string, string] }
  | { method: 'addWord'; args: [number, Word] }
  | { method: 'addTag'; args: [number, string] }
  | { method: 'updateLesson'; args: [number, string, string] }
  | { method: 'updateWord'; args: [number, Word] }
  | { method: 'replaceTags'; args: [number, string[]] }
  | { method: 'deleteLesson'; args: [number] }
  | { method: 'deleteWord'; args: [number] };

/**
 * Records every write in order. Ids handed out by addLesson/addWord come from
 * the queues set by the test; once a queue is empty ids continue from 100.
 */
export class RecordingStore implements LessonStore {
  readonly calls: StoreCall[] = [];
  lessonIds: number[] = [];
  wordIds: number[] = [];
  lessons: Lesson[] = [];
  transactions = 0;
  private nextId = 100;

  addLesson(mainName: string, subName: string): number {
    this.calls.push({ method: 'addLesson', args: [mainName, subName] });
    return this.lessonIds.shift() ?? this.nextId++;
  }

  addWord(lessonId: number, word: Word): number {
    this.calls.push({ method: 'addWord', args: [lessonId, word] });
    return this.wordIds.shift() ?? this.nextId++;
  }

  addTag(wordId: number, tag: string) {
    this.calls.push({ method: 'addTag', args: [wordId, tag] });
  }

  updateLesson(lessonId: number, newMainName: string, newSubName: string) {
    this.calls.push({ method: 'updateLesson', args: [lessonId, newMainName, newSubName] });
  }

  updateWord(wordId: number, updatedWord: Word) {
    this.calls.push({ method: 'updateWord', args: [wordId, updatedWord] });
  }

  replaceTags(wordId: number, tags: string[]) {
    this.calls.push({ method: 'replaceTags', args: [wordId, tags] });
  }

  deleteLesson(lessonId: number) {
    this.calls.push({ method: 'deleteLesson', args: [lessonId] });
  }

  deleteWord(wordId: number) {
    this.calls.push({ method: 'deleteWord', args: [wordId] });
  }

  getAllLessons(): Lesson[] {
    return this.lessons;
  }

  getLesson(lessonId: number): Lesson | null {
    return this.lessons.find((lesson) => lesson.id === lessonId) ?? null;
  }

  getLessonNames(): string[] {
    return this.lessons.map((lesson) => `${lesson.mainName} - ${lesson.subName}`);
  }

  getWordsInLesson(lessonId: number): Word[] {
    return this.getLesson(lessonId)?.words ?? [];
  }

  runInTransaction<T>(fn: () => T): T {
    this.transactions += 1;
    return fn();
  }

  methods(): string[] {
    return this.calls.map((call) => call.method);
  }
}
