import { z } from 'zod';
import { ConfigError } from './errors';
import type { LogLevel } from './logger';
import type { WordType } from '../types/messages';

const WORD_TYPES = ['base-word', 'kana', 'romaji'] as const satisfies readonly WordType[];
const LOG_LEVELS = ['debug', 'info', 'warning', 'problem'] as const satisfies readonly LogLevel[];

const envSchema = z.object({
  VOCAB_DRILL_DB_PATH: z.string().trim().min(1).default('data/vocab-drill.sqlite'),
  VOCAB_DRILL_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  VOCAB_DRILL_QUIZ_OPTIONS: z.coerce.number().int().min(2).max(8).default(4),
  VOCAB_DRILL_QUESTION_TYPE: z.enum(WORD_TYPES).default('kana'),
  VOCAB_DRILL_ANSWER_TYPE: z.enum(WORD_TYPES).default('base-word'),
  VOCAB_DRILL_LEARNED_THRESHOLD: z.coerce.number().int().min(1).default(1),
  VOCAB_DRILL_REVEAL_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  VOCAB_DRILL_QUIZ_SEED: z.coerce.number().int().optional(),
});

export interface QuizConfig {
  optionCount: number;
  questionType: WordType;
  answerType: WordType;
  learnedThreshold: number;
  revealDelayMs: number;
  seed: number | null;
}

export interface AppConfig {
  dbPath: string;
  logLevel: LogLevel;
  quiz: QuizConfig;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Blank variables count as unset so an empty line in .env falls back to the default.
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );
  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const values = parsed.data;
  if (values.VOCAB_DRILL_QUESTION_TYPE === values.VOCAB_DRILL_ANSWER_TYPE) {
    throw new ConfigError([
      'VOCAB_DRILL_ANSWER_TYPE: must differ from VOCAB_DRILL_QUESTION_TYPE',
    ]);
  }

  return {
    dbPath: values.VOCAB_DRILL_DB_PATH,
    logLevel: values.VOCAB_DRILL_LOG_LEVEL,
    quiz: {
      optionCount: values.VOCAB_DRILL_QUIZ_OPTIONS,
      questionType: values.VOCAB_DRILL_QUESTION_TYPE,
      answerType: values.VOCAB_DRILL_ANSWER_TYPE,
      learnedThreshold: values.VOCAB_DRILL_LEARNED_THRESHOLD,
      revealDelayMs: values.VOCAB_DRILL_REVEAL_DELAY_MS,
      seed: values.VOCAB_DRILL_QUIZ_SEED ?? null,
    },
  };
}
