import fs from 'fs-extra';
import { z } from 'zod';
import { LessonImportError } from './errors';
import type { LessonManager } from './lessonManager';
import { describeError, type Logger } from './logger';
import { FAILED_ID, createLesson, createWord, type Lesson } from './types';
import type { ImportLessonsResult } from '../types/messages';

const wordSchema = z.object({
  kana: z.string().min(1),
  translation: z.string().min(1),
  romaji: z.string().default(''),
  exampleSentence: z.string().default(''),
  tags: z.array(z.string().min(1)).default([]),
});

const lessonSchema = z.object({
  mainName: z.string().min(1),
  subName: z.string().default(''),
  words: z.array(wordSchema).default([]),
});

const lessonFileSchema = z.object({
  lessons: z.array(lessonSchema),
});

export function parseLessonFile(raw: unknown, filePath: string): Lesson[] {
  const parsed = lessonFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new LessonImportError(
      filePath,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  return parsed.data.lessons.map((lesson) =>
    createLesson({
      mainName: lesson.mainName,
      subName: lesson.subName,
      words: lesson.words.map((word) => createWord(word)),
    }),
  );
}

export async function importLessons(
  filePath: string,
  manager: LessonManager,
  logger: Logger,
): Promise<ImportLessonsResult> {
  if (!(await fs.pathExists(filePath))) {
    throw new LessonImportError(filePath, ['file not found']);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, 'utf8'));
  } catch (error) {
    throw new LessonImportError(filePath, [`invalid JSON: ${describeError(error)}`]);
  }

  const lessons = parseLessonFile(raw, filePath);
  const lessonIds = manager.addLessons(lessons);
  const count = lessonIds.filter((id) => id !== FAILED_ID).length;

  logger.log(`Import: Stored ${count} of ${lessons.length} lessons from ${filePath}`, 'info');
  return { lessonIds, count };
}
