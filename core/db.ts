import Database from 'better-sqlite3';
import fs from 'fs-extra';
import path from 'node:path';
import { DatabaseOpenError } from './errors';
import { describeError, type Logger } from './logger';
import {
  FAILED_ID,
  formatLessonName,
  rowToWord,
  type Lesson,
  type LessonRow,
  type TagRow,
  type Word,
  type WordRow,
} from './types';

export const IN_MEMORY = ':memory:';

/**
 * Synchronous storage contract for lessons, words and tags. Writes that fail
 * are logged by the implementation and reported through `FAILED_ID` (or
 * silently skipped for void operations); they never throw.
 */
export interface LessonStore {
  addLesson(mainName: string, subName: string): number;
  addWord(lessonId: number, word: Word): number;
  addTag(wordId: number, tag: string): void;
  updateLesson(lessonId: number, newMainName: string, newSubName: string): void;
  updateWord(wordId: number, updatedWord: Word): void;
  replaceTags(wordId: number, tags: string[]): void;
  deleteLesson(lessonId: number): void;
  deleteWord(wordId: number): void;
  getAllLessons(): Lesson[];
  getLesson(lessonId: number): Lesson | null;
  getLessonNames(): string[];
  getWordsInLesson(lessonId: number): Word[];
  runInTransaction<T>(fn: () => T): T;
}

function applySchema(database: Database.Database) {
  const userVersion = Number(database.pragma('user_version', { simple: true }));

  if (userVersion < 1) {
    database.exec(`
      CREATE TABLE IF NOT EXISTS lessons (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        main_name TEXT NOT NULL,
        sub_name TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS words (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        lesson_id INTEGER NOT NULL REFERENCES lessons(id) ON DELETE CASCADE,
        kana TEXT NOT NULL,
        translation TEXT NOT NULL,
        romaji TEXT,
        example_sentence TEXT
      );

      CREATE TABLE IF NOT EXISTS tags (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        word_id INTEGER NOT NULL REFERENCES words(id) ON DELETE CASCADE,
        tag TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_words_lesson_id ON words(lesson_id);
      CREATE INDEX IF NOT EXISTS idx_tags_word_id ON tags(word_id);
    `);
    database.pragma('user_version = 1');
  }
}

export class LessonsDatabase implements LessonStore {
  private constructor(
    private readonly database: Database.Database,
    private readonly logger: Logger,
  ) {}

  static open(dbPath: string, logger: Logger): LessonsDatabase {
    let instance: Database.Database | undefined;
    try {
      if (dbPath !== IN_MEMORY) {
        fs.ensureDirSync(path.dirname(dbPath));
      }
      instance = new Database(dbPath);
      if (dbPath !== IN_MEMORY) {
        instance.pragma('journal_mode = WAL');
      }
      instance.pragma('foreign_keys = ON');
      applySchema(instance);
    } catch (error) {
      instance?.close();
      logger.log(`Database: Can't open database: ${describeError(error)}`, 'problem');
      throw new DatabaseOpenError(dbPath, error);
    }

    logger.log(`Database: Opened database successfully at ${dbPath}`, 'info');
    return new LessonsDatabase(instance, logger);
  }

  close() {
    this.database.close();
    this.logger.log('Database: Closed database connection.', 'info');
  }

  /** Runs one statement, turning a SQLite error into a logged fallback value. */
  private execute<T>(action: string, fallback: T, fn: (database: Database.Database) => T): T {
    try {
      return fn(this.database);
    } catch (error) {
      this.logger.log(`Database: SQL error while ${action}: ${describeError(error)}`, 'problem');
      return fallback;
    }
  }

  addLesson(mainName: string, subName: string): number {
    const lessonId = this.execute('adding lesson', FAILED_ID, (database) => {
      const result = database
        .prepare('INSERT INTO lessons (main_name, sub_name) VALUES (@mainName, @subName)')
        .run({ mainName, subName });
      return Number(result.lastInsertRowid);
    });

    if (lessonId !== FAILED_ID) {
      this.logger.log(
        `Database: Added lesson with ID ${lessonId}, mainName: ${mainName}, subName: ${subName}`,
        'info',
      );
    }
    return lessonId;
  }

  addWord(lessonId: number, word: Word): number {
    const wordId = this.execute('adding word', FAILED_ID, (database) => {
      const result = database
        .prepare(
          `
          INSERT INTO words (lesson_id, kana, translation, romaji, example_sentence)
          VALUES (@lessonId, @kana, @translation, @romaji, @exampleSentence)
        `,
        )
        .run({
          lessonId,
          kana: word.kana,
          translation: word.translation,
          romaji: word.romaji,
          exampleSentence: word.exampleSentence,
        });
      return Number(result.lastInsertRowid);
    });

    if (wordId !== FAILED_ID) {
      this.logger.log(`Database: Added word with ID ${wordId} to lesson ID ${lessonId}`, 'info');
    }
    return wordId;
  }

  addTag(wordId: number, tag: string) {
    const added = this.execute<boolean>('adding tag', false, (database) => {
      database.prepare('INSERT INTO tags (word_id, tag) VALUES (?, ?)').run(wordId, tag);
      return true;
    });

    if (added) {
      this.logger.log(`Database: Added tag '${tag}' to word ID ${wordId}`, 'info');
    }
  }

  updateLesson(lessonId: number, newMainName: string, newSubName: string) {
    const changes = this.execute('updating lesson', 0, (database) => {
      return database
        .prepare('UPDATE lessons SET main_name = @mainName, sub_name = @subName WHERE id = @lessonId')
        .run({ lessonId, mainName: newMainName, subName: newSubName }).changes;
    });

    if (changes > 0) {
      this.logger.log(
        `Database: Updated lesson ID ${lessonId} to mainName: ${newMainName}, subName: ${newSubName}`,
        'info',
      );
    }
  }

  updateWord(wordId: number, updatedWord: Word) {
    const changes = this.execute('updating word', 0, (database) => {
      return database
        .prepare(
          `
          UPDATE words
          SET kana = @kana,
              translation = @translation,
              romaji = @romaji,
              example_sentence = @exampleSentence
          WHERE id = @wordId
        `,
        )
        .run({
          wordId,
          kana: updatedWord.kana,
          translation: updatedWord.translation,
          romaji: updatedWord.romaji,
          exampleSentence: updatedWord.exampleSentence,
        }).changes;
    });

    if (changes > 0) {
      this.logger.log(`Database: Updated word ID ${wordId}`, 'info');
    }
  }

  replaceTags(wordId: number, tags: string[]) {
    const replaced = this.execute<boolean>('replacing tags', false, (database) => {
      const remove = database.prepare('DELETE FROM tags WHERE word_id = ?');
      const insert = database.prepare('INSERT INTO tags (word_id, tag) VALUES (?, ?)');
      database.transaction(() => {
        remove.run(wordId);
        for (const tag of tags) {
          insert.run(wordId, tag);
        }
      })();
      return true;
    });

    if (replaced) {
      this.logger.log(`Database: Replaced tags of word ID ${wordId} (${tags.length} tags)`, 'info');
    }
  }

  deleteLesson(lessonId: number) {
    const changes = this.execute('deleting lesson', 0, (database) => {
      return database.prepare('DELETE FROM lessons WHERE id = ?').run(lessonId).changes;
    });

    if (changes > 0) {
      this.logger.log(`Database: Deleted lesson ID ${lessonId}`, 'info');
    }
  }

  deleteWord(wordId: number) {
    const changes = this.execute('deleting word', 0, (database) => {
      return database.prepare('DELETE FROM words WHERE id = ?').run(wordId).changes;
    });

    if (changes > 0) {
      this.logger.log(`Database: Deleted word ID ${wordId}`, 'info');
    }
  }

  getLessonNames(): string[] {
    return this.execute<string[]>('reading lesson names', [], (database) => {
      const rows = database
        .prepare<unknown[], LessonRow>('SELECT id, main_name, sub_name FROM lessons ORDER BY id ASC')
        .all();
      return rows.map((row) => formatLessonName({ mainName: row.main_name, subName: row.sub_name }));
    });
  }

  getWordsInLesson(lessonId: number): Word[] {
    return this.execute<Word[]>('reading words', [], (database) => {
      const wordRows = database
        .prepare<[number], WordRow>(
          `
          SELECT id, lesson_id, kana, translation, romaji, example_sentence
          FROM words
          WHERE lesson_id = ?
          ORDER BY id ASC
        `,
        )
        .all(lessonId);

      const tagRows = database
        .prepare<[number], TagRow>(
          `
          SELECT t.id, t.word_id, t.tag
          FROM tags t
          JOIN words w ON w.id = t.word_id
          WHERE w.lesson_id = ?
          ORDER BY t.id ASC
        `,
        )
        .all(lessonId);

      const tagsByWord = new Map<number, string[]>();
      for (const row of tagRows) {
        const tags = tagsByWord.get(row.word_id) ?? [];
        tags.push(row.tag);
        tagsByWord.set(row.word_id, tags);
      }

      return wordRows.map((row) => rowToWord(row, tagsByWord.get(row.id) ?? []));
    });
  }

  getLesson(lessonId: number): Lesson | null {
    const row = this.execute('reading lesson', undefined, (database) => {
      return database
        .prepare<[number], LessonRow>('SELECT id, main_name, sub_name FROM lessons WHERE id = ?')
        .get(lessonId);
    });

    if (!row) return null;

    return {
      id: row.id,
      mainName: row.main_name,
      subName: row.sub_name,
      words: this.getWordsInLesson(row.id),
    };
  }

  getAllLessons(): Lesson[] {
    const rows = this.execute<LessonRow[]>('reading lessons', [], (database) => {
      return database
        .prepare<unknown[], LessonRow>('SELECT id, main_name, sub_name FROM lessons ORDER BY id ASC')
        .all();
    });

    return rows.map((row) => ({
      id: row.id,
      mainName: row.main_name,
      subName: row.sub_name,
      words: this.getWordsInLesson(row.id),
    }));
  }

  runInTransaction<T>(fn: () => T): T {
    const trx = this.database.transaction(fn);
    return trx();
  }
}
