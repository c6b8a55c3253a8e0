import type { QuizViewDTO } from '../../types/messages';
import type { QuizSession } from './quizSession';

export const DEFAULT_REVEAL_DELAY_MS = 2000;

interface PendingAnswer {
  selectedIndex: number;
  startedAt: number;
}

/**
 * Pacing for a polling presentation loop: after a selection the correct
 * answer stays highlighted until `tick` sees the delay has elapsed, and only
 * then is the answer passed to the session. The question and options shown
 * are buffered so a frame never sees the next card early.
 */
export class AnswerReveal {
  private pending: PendingAnswer | null = null;
  private question = '';
  private options: string[] = [];

  constructor(
    private readonly session: QuizSession,
    private readonly delayMs: number = DEFAULT_REVEAL_DELAY_MS,
  ) {
    this.refresh();
  }

  isRevealing(): boolean {
    return this.pending !== null;
  }

  /** Returns false when the selection was ignored. */
  select(index: number, now: number): boolean {
    if (this.pending || this.session.getState() !== 'in-progress') return false;
    if (index < 0 || index >= this.options.length) return false;
    this.pending = { selectedIndex: index, startedAt: now };
    return true;
  }

  /** Returns true when the pending answer was committed on this tick. */
  tick(now: number): boolean {
    if (!this.pending || now - this.pending.startedAt < this.delayMs) return false;

    const { selectedIndex } = this.pending;
    this.pending = null;
    this.session.answer(selectedIndex);
    this.refresh();
    return true;
  }

  restart() {
    this.pending = null;
    this.session.start();
    this.refresh();
  }

  view(): QuizViewDTO {
    const state = this.session.getState();
    const total = this.session.getTotalQuestions();
    return {
      state,
      question: this.question,
      options: [...this.options],
      highlightIndex: this.pending ? this.session.getCorrectAnswerIndex() : null,
      progress: {
        current: Math.min(this.session.getCurrentQuestionIndex() + 1, total),
        total,
      },
      results: state === 'finished' ? this.session.getResults() : null,
    };
  }

  private refresh() {
    this.question = this.session.getCurrentQuestion();
    this.options = this.session.getCurrentOptions();
  }
}
