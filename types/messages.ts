export type WordType = 'base-word' | 'kana' | 'romaji';

export type QuizState = 'idle' | 'in-progress' | 'finished';

export interface WordSnapshot {
  id: number;
  kana: string;
  translation: string;
  romaji: string;
  exampleSentence: string;
  tags: string[];
}

export interface LessonSnapshot {
  id: number;
  mainName: string;
  subName: string;
  words: WordSnapshot[];
}

export type LessonMessageType = 'created' | 'modified' | 'deleted';

export interface LessonMessage {
  type: LessonMessageType;
  lessons: LessonSnapshot[];
}

export interface ImportLessonsResult {
  lessonIds: number[];
  count: number;
}

export interface QuizViewDTO {
  state: QuizState;
  question: string;
  options: string[];
  highlightIndex: number | null; // set while the correct answer is being shown
  progress: {
    current: number;
    total: number;
  };
  results: string | null;
}

export interface FlashcardOutcomeDTO {
  wordId: number;
  lessonId: number;
  prompt: string;
  goodAttempts: number;
  badAttempts: number;
  learned: boolean;
}

export interface QuizSummary {
  total: number;
  answered: number;
  learned: number;
  notLearned: number;
  goodAttempts: number;
  badAttempts: number;
  cards: FlashcardOutcomeDTO[];
}
