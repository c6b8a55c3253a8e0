#!/usr/bin/env node
import { config } from 'dotenv';
import { loadConfig, type AppConfig } from './config';
import { LessonsDatabase } from './db';
import { importLessons } from './lessonImport';
import { LessonManager } from './lessonManager';
import {
  createBufferedLogger,
  createConsoleLogger,
  describeError,
  type LogEntry,
  type Logger,
} from './logger';
import { AnswerReveal } from './quiz/answerReveal';
import { QuizSession } from './quiz/quizSession';
import { createSeededRandom, type RandomSource } from './quiz/random';
import type { Lesson } from './types';
import type { ImportLessonsResult, LessonMessage } from '../types/messages';

/** Surface consumed by a presentation layer. */
export interface AppApi {
  listLessons(): Lesson[];
  listLessonNames(): string[];
  importLessons(filePath: string): Promise<ImportLessonsResult>;
  renameLessons(lessons: Lesson[]): void;
  deleteLessons(lessons: Lesson[]): void;
  applyLessonMessage(message: LessonMessage): void;
  startQuiz(lessonIds?: number[]): AnswerReveal;
  getLogs(): LogEntry[];
}

export interface App {
  manager: LessonManager;
  api: AppApi;
  close(): void;
}

export interface CreateAppOptions {
  random?: RandomSource;
  /** Where log lines go besides the in-memory buffer; null keeps them in memory only. */
  forwardLogsTo?: Logger | null;
}

export function createApp(appConfig: AppConfig, options: CreateAppOptions = {}): App {
  const forward =
    options.forwardLogsTo === undefined
      ? createConsoleLogger('vocab-drill', appConfig.logLevel)
      : options.forwardLogsTo ?? undefined;
  const logger = createBufferedLogger('vocab-drill', forward);

  const database = LessonsDatabase.open(appConfig.dbPath, logger.child('db'));
  const manager = new LessonManager(database, logger.child('lessons'));

  const random =
    options.random ??
    (appConfig.quiz.seed === null ? Math.random : createSeededRandom(appConfig.quiz.seed));

  const api: AppApi = {
    listLessons: () => manager.getAllLessons(),
    listLessonNames: () => manager.getLessonNames(),
    importLessons: (filePath) => importLessons(filePath, manager, logger.child('import')),
    renameLessons: (lessons) => manager.renameLessons(lessons),
    deleteLessons: (lessons) => manager.deleteLessons(lessons),
    applyLessonMessage: (message) => manager.handleMessage(message),
    startQuiz: (lessonIds) => {
      const lessons = manager
        .getAllLessons()
        .filter((lesson) => !lessonIds || lessonIds.includes(lesson.id));
      const session = new QuizSession(lessons, {
        questionType: appConfig.quiz.questionType,
        answerType: appConfig.quiz.answerType,
        optionCount: appConfig.quiz.optionCount,
        learnedThreshold: appConfig.quiz.learnedThreshold,
        random,
        logger: logger.child('quiz'),
      });
      session.start();
      return new AnswerReveal(session, appConfig.quiz.revealDelayMs);
    },
    getLogs: () => logger.entries(),
  };

  return {
    manager,
    api,
    close: () => database.close(),
  };
}

const USAGE = `Usage:
  vocab-drill import <file.json>   store the lessons listed in a JSON file
  vocab-drill list                 print stored lessons and word counts`;

export async function main(argv: string[]): Promise<number> {
  config();

  const [command, ...args] = argv;
  if (command !== 'import' && command !== 'list') {
    console.info(USAGE);
    return command ? 1 : 0;
  }

  let app: App;
  try {
    app = createApp(loadConfig());
  } catch (error) {
    console.error('[vocab-drill] Failed to start:', describeError(error));
    return 1;
  }

  try {
    if (command === 'import') {
      const [filePath] = args;
      if (!filePath) {
        console.info(USAGE);
        return 1;
      }
      const { count, lessonIds } = await app.api.importLessons(filePath);
      console.info(`Imported ${count} of ${lessonIds.length} lessons.`);
      return count === lessonIds.length ? 0 : 1;
    }

    for (const lesson of app.api.listLessons()) {
      console.info(`${lesson.id}\t${lesson.mainName} - ${lesson.subName}\t${lesson.words.length} words`);
    }
    return 0;
  } catch (error) {
    console.error(`[vocab-drill] ${command} failed:`, describeError(error));
    return 1;
  } finally {
    app.close();
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error('[vocab-drill] Unexpected failure', error);
      process.exitCode = 1;
    });
}
