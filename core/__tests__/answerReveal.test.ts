import { describe, expect, it } from 'vitest';
import { AnswerReveal } from '../quiz/answerReveal';
import { QuizSession } from '../quiz/quizSession';
import { createSeededRandom } from '../quiz/random';
import { createLesson, createWord } from '../types';

const lessons = [
  createLesson({
    id: 1,
    mainName: 'Colors',
    subName: 'Basic',
    words: [
      createWord({ id: 1, kana: 'あか', translation: 'red' }),
      createWord({ id: 2, kana: 'あお', translation: 'blue' }),
      createWord({ id: 3, kana: 'しろ', translation: 'white' }),
    ],
  }),
];

function startedReveal(delayMs = 2000) {
  const session = new QuizSession(lessons, { random: createSeededRandom(21) });
  session.start();
  return { session, reveal: new AnswerReveal(session, delayMs) };
}

describe('AnswerReveal', () => {
  it('highlights the correct answer and holds the question until the delay passes', () => {
    const { session, reveal } = startedReveal();
    const before = reveal.view();

    expect(reveal.select(0, 1_000)).toBe(true);
    expect(reveal.view().highlightIndex).toBe(session.getCorrectAnswerIndex());

    expect(reveal.tick(2_999)).toBe(false);
    expect(reveal.view().question).toBe(before.question);
    expect(session.getCurrentQuestionIndex()).toBe(0);

    expect(reveal.tick(3_000)).toBe(true);
    expect(session.getCurrentQuestionIndex()).toBe(1);
    expect(reveal.view().highlightIndex).toBeNull();
    expect(reveal.view().question).toBe(session.getCurrentQuestion());
    expect(reveal.view().progress).toEqual({ current: 2, total: 3 });
  });

  it('ignores further selections while revealing', () => {
    const { reveal } = startedReveal();

    reveal.select(0, 0);
    expect(reveal.select(1, 500)).toBe(false);
    expect(reveal.isRevealing()).toBe(true);
  });

  it('ignores selections outside the options', () => {
    const { reveal } = startedReveal();

    expect(reveal.select(-1, 0)).toBe(false);
    expect(reveal.select(3, 0)).toBe(false);
    expect(reveal.isRevealing()).toBe(false);
  });

  it('commits the selected option rather than the highlighted one', () => {
    const { session, reveal } = startedReveal(0);
    const wrong = (session.getCorrectAnswerIndex() + 1) % session.getCurrentOptions().length;

    reveal.select(wrong, 0);
    reveal.tick(0);

    expect(session.getSummary().badAttempts).toBe(1);
  });

  it('shows results when finished and restarts on request', () => {
    const { session, reveal } = startedReveal(10);
    let now = 0;
    while (!session.isFinished()) {
      reveal.select(session.getCorrectAnswerIndex(), now);
      now += 10;
      reveal.tick(now);
    }

    expect(reveal.view()).toEqual({
      state: 'finished',
      question: '',
      options: [],
      highlightIndex: null,
      progress: { current: 3, total: 3 },
      results: 'Learned 3 of 3 words (0 wrong answers).',
    });
    expect(reveal.select(0, now)).toBe(false);

    reveal.restart();

    expect(reveal.view().state).toBe('in-progress');
    expect(reveal.view().progress).toEqual({ current: 1, total: 3 });
  });
});
