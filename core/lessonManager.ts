import type { LessonStore } from './db';
import { LessonWriteError } from './errors';
import { describeError, type Logger } from './logger';
import { FAILED_ID, formatLessonName, wordsEqual, type Lesson, type Word } from './types';
import type { LessonMessage } from '../types/messages';

function hasStoredId(lesson: { id: number }): boolean {
  return lesson.id > 0;
}

/**
 * Coordinates the store calls behind each lesson-level write. A lesson is
 * written or synced inside one transaction: when the lesson row or any of its
 * words cannot be inserted, nothing of that write is kept.
 */
export class LessonManager {
  constructor(
    private readonly store: LessonStore,
    private readonly logger: Logger,
  ) {}

  addLesson(lesson: Lesson): number {
    try {
      return this.store.runInTransaction(() => this.writeLesson(lesson));
    } catch (error) {
      if (!(error instanceof LessonWriteError)) throw error;
      this.logger.log(
        `LessonManager: Lesson '${formatLessonName(lesson)}' was not stored: ${describeError(error)}`,
        'problem',
      );
      return FAILED_ID;
    }
  }

  private writeLesson(lesson: Lesson): number {
    const lessonId = this.store.addLesson(lesson.mainName, lesson.subName);
    if (lessonId === FAILED_ID) {
      throw new LessonWriteError('lesson row insert failed');
    }

    for (const word of lesson.words) {
      this.insertWord(lessonId, word);
    }

    return lessonId;
  }

  private insertWord(lessonId: number, word: Word) {
    const wordId = this.store.addWord(lessonId, word);
    if (wordId === FAILED_ID) {
      throw new LessonWriteError(`word '${word.kana}' insert failed`);
    }
    for (const tag of word.tags) {
      this.store.addTag(wordId, tag);
    }
  }

  /** Adds every lesson in order. A failed lesson yields FAILED_ID and does not stop the rest. */
  addLessons(lessons: Lesson[]): number[] {
    const ids = lessons.map((lesson) => this.addLesson(lesson));
    const failed = ids.filter((id) => id === FAILED_ID).length;
    if (failed > 0) {
      this.logger.log(`LessonManager: ${failed} of ${lessons.length} lessons failed to store`, 'warning');
    }
    return ids;
  }

  renameLessons(lessons: Lesson[]) {
    for (const lesson of lessons) {
      if (!hasStoredId(lesson)) {
        this.logger.log(
          `LessonManager: Skipping rename of unsaved lesson '${formatLessonName(lesson)}'`,
          'warning',
        );
        continue;
      }
      this.store.updateLesson(lesson.id, lesson.mainName, lesson.subName);
    }
  }

  deleteLessons(lessons: Lesson[]) {
    for (const lesson of lessons) {
      if (!hasStoredId(lesson)) {
        this.logger.log('LessonManager: Skipping delete of unsaved lesson', 'warning');
        continue;
      }
      this.store.deleteLesson(lesson.id);
    }
  }

  /**
   * Makes the stored lesson match `lesson`: names, fields and tags of words
   * with an id, new rows for words without one, and removal of stored words
   * the lesson no longer lists. Word ids that belong to another lesson are
   * skipped. Like `addLesson`, a failed word insert rolls the whole sync back.
   */
  syncLesson(lesson: Lesson): boolean {
    if (!hasStoredId(lesson)) {
      this.logger.log('LessonManager: Cannot sync a lesson without an id', 'warning');
      return false;
    }

    try {
      return this.store.runInTransaction(() => this.writeSync(lesson));
    } catch (error) {
      if (!(error instanceof LessonWriteError)) throw error;
      this.logger.log(
        `LessonManager: Lesson '${formatLessonName(lesson)}' was not synced: ${describeError(error)}`,
        'problem',
      );
      return false;
    }
  }

  private writeSync(lesson: Lesson): boolean {
    const stored = this.store.getLesson(lesson.id);
    if (!stored) {
      this.logger.log(`LessonManager: Cannot sync lesson ID ${lesson.id}, it is not stored`, 'warning');
      return false;
    }

    this.store.updateLesson(lesson.id, lesson.mainName, lesson.subName);

    const keptIds = new Set(lesson.words.filter(hasStoredId).map((word) => word.id));
    const storedWords = new Map(stored.words.map((word): [number, Word] => [word.id, word]));
    for (const storedId of storedWords.keys()) {
      if (!keptIds.has(storedId)) {
        this.store.deleteWord(storedId);
      }
    }

    for (const word of lesson.words) {
      if (!hasStoredId(word)) {
        this.insertWord(lesson.id, word);
        continue;
      }
      const storedWord = storedWords.get(word.id);
      if (!storedWord) {
        this.logger.log(
          `LessonManager: Skipping word ID ${word.id}, it is not stored in lesson ID ${lesson.id}`,
          'warning',
        );
        continue;
      }
      if (wordsEqual(storedWord, word)) continue;
      this.store.updateWord(word.id, word);
      this.store.replaceTags(word.id, word.tags);
    }

    return true;
  }

  getAllLessons(): Lesson[] {
    return this.store.getAllLessons();
  }

  getLessonNames(): string[] {
    return this.store.getLessonNames();
  }

  handleMessage(message: LessonMessage) {
    switch (message.type) {
      case 'created':
        this.addLessons(message.lessons);
        break;
      case 'modified':
        message.lessons.forEach((lesson) => this.syncLesson(lesson));
        break;
      case 'deleted':
        this.deleteLessons(message.lessons);
        break;
      default: {
        const unknownType: never = message.type;
        throw new Error(`Unknown lesson message ${String(unknownType)}`);
      }
    }
  }
}
