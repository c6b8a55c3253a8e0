import type { Logger } from '../logger';
import type { Lesson } from '../types';
import type { QuizState, QuizSummary, WordType } from '../../types/messages';
import { flashcardsFromLessons, resolveWordField, type Flashcard } from './flashcard';
import { sample, shuffle, type RandomSource } from './random';

export interface QuizSessionOptions {
  questionType?: WordType;
  answerType?: WordType;
  optionCount?: number; // correct answer included
  learnedThreshold?: number; // correct answers before a card counts as learned
  random?: RandomSource;
  logger?: Logger;
}

const FIRST_LABEL = 'a'.charCodeAt(0);

export function optionLabel(index: number): string {
  return String.fromCharCode(FIRST_LABEL + index);
}

export function labelToIndex(label: string): number {
  if (label.length !== 1) return -1;
  const index = label.toLowerCase().charCodeAt(0) - FIRST_LABEL;
  return index >= 0 ? index : -1;
}

/**
 * Single-player multiple-choice session over the words of a set of lessons.
 *
 * Options for the current card are built when the cursor moves, so every
 * query between two answers returns the same values.
 */
export class QuizSession {
  private readonly questionType: WordType;
  private readonly answerType: WordType;
  private readonly optionCount: number;
  private readonly learnedThreshold: number;
  private readonly random: RandomSource;
  private readonly logger?: Logger;

  private state: QuizState = 'idle';
  private deck: Flashcard[] = [];
  private cursor = 0;
  private options: string[] = [];
  private correctIndex = -1;

  constructor(
    private readonly lessons: readonly Lesson[],
    options: QuizSessionOptions = {},
  ) {
    this.questionType = options.questionType ?? 'kana';
    this.answerType = options.answerType ?? 'base-word';
    this.optionCount = Math.max(2, options.optionCount ?? 4);
    this.learnedThreshold = Math.max(1, options.learnedThreshold ?? 1);
    this.random = options.random ?? Math.random;
    this.logger = options.logger;
  }

  start() {
    this.deck = shuffle(flashcardsFromLessons(this.lessons), this.random);
    this.cursor = 0;
    this.state = this.deck.length > 0 ? 'in-progress' : 'finished';
    this.prepareQuestion();
    this.logger?.log(`Quiz: Started with ${this.deck.length} flashcards`, 'info');
  }

  getState(): QuizState {
    return this.state;
  }

  isFinished(): boolean {
    return this.state === 'finished';
  }

  getCurrentQuestionIndex(): number {
    return this.cursor;
  }

  getTotalQuestions(): number {
    return this.deck.length;
  }

  getCurrentFlashcard(): Flashcard | null {
    if (this.state !== 'in-progress') return null;
    return { ...this.deck[this.cursor] };
  }

  getCurrentQuestion(): string {
    const card = this.currentCard();
    return card ? resolveWordField(card.word, this.questionType) : '';
  }

  getCurrentOptions(): string[] {
    return [...this.options];
  }

  getCorrectAnswerIndex(): number {
    return this.correctIndex;
  }

  advance(selectedLabel: string) {
    this.answer(labelToIndex(selectedLabel));
  }

  answer(selectedIndex: number) {
    const card = this.currentCard();
    if (!card) {
      this.logger?.log(`Quiz: Ignoring answer while ${this.state}`, 'warning');
      return;
    }

    if (selectedIndex === this.correctIndex) {
      card.goodAttempts += 1;
      card.learned = card.goodAttempts >= this.learnedThreshold;
    } else {
      card.badAttempts += 1;
    }

    this.cursor += 1;
    if (this.cursor >= this.deck.length) {
      this.state = 'finished';
      this.logger?.log(`Quiz: Finished. ${this.getResults()}`, 'info');
    }
    this.prepareQuestion();
  }

  getResults(): string {
    const { total, learned, badAttempts } = this.getSummary();
    return `Learned ${learned} of ${total} words (${badAttempts} wrong answers).`;
  }

  getSummary(): QuizSummary {
    const cards = this.deck.map((card) => ({
      wordId: card.word.id,
      lessonId: card.lessonId,
      prompt: resolveWordField(card.word, this.questionType),
      goodAttempts: card.goodAttempts,
      badAttempts: card.badAttempts,
      learned: card.learned,
    }));
    const learned = cards.filter((card) => card.learned).length;

    return {
      total: cards.length,
      answered: this.cursor,
      learned,
      notLearned: cards.length - learned,
      goodAttempts: cards.reduce((sum, card) => sum + card.goodAttempts, 0),
      badAttempts: cards.reduce((sum, card) => sum + card.badAttempts, 0),
      cards,
    };
  }

  private currentCard(): Flashcard | undefined {
    return this.state === 'in-progress' ? this.deck[this.cursor] : undefined;
  }

  private prepareQuestion() {
    const card = this.currentCard();
    if (!card) {
      this.options = [];
      this.correctIndex = -1;
      return;
    }

    const correct = resolveWordField(card.word, this.answerType);
    const pool = new Set<string>();
    this.deck.forEach((other, index) => {
      if (index === this.cursor) return;
      const value = resolveWordField(other.word, this.answerType);
      if (value !== '' && value !== correct) {
        pool.add(value);
      }
    });

    if (pool.size < this.optionCount - 1) {
      this.logger?.log(
        `Quiz: Only ${pool.size} distractors available for '${correct}'`,
        'debug',
      );
    }

    const distractors = sample([...pool], this.optionCount - 1, this.random);
    this.options = shuffle([correct, ...distractors], this.random);
    this.correctIndex = this.options.indexOf(correct);
  }
}
