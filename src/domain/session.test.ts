import { createConditionalOption, createHabit } from './habits';
import { createRoutineTemplate } from './routineTemplates';
import {
  activeHabits,
  addSessionHabit,
  completeCurrentHabit,
  completionCounts,
  createSession,
  currentHabit,
  forceCompleteSession,
  goToHabit,
  goToPreviousHabit,
  injectConditionalPath,
  isSessionCompleted,
  modifySessionHabit,
  removeSessionHabit,
  reorderSessionHabits,
  sessionDuration,
  sessionProgress,
  skipCurrentHabit,
} from './session';
import type { Habit, HabitType } from './types';

const t0 = new Date('2026-03-02T07:00:00.000Z');
const at = (seconds: number) => new Date(t0.getTime() + seconds * 1000);

function habit(id: string, order: number, type: HabitType = { kind: 'checkbox' }, isActive = true): Habit {
  return createHabit({ id, name: id.toUpperCase(), type, order, isActive });
}

function morningSession() {
  const template = createRoutineTemplate({
    id: 'tpl-1',
    name: 'Morning',
    color: '#FF9500',
    habits: [
      habit('a', 0),
      habit('b', 1, { kind: 'timer', defaultDuration: 300 }),
      habit('c', 2),
      habit('x', 3, { kind: 'checkbox' }, false),
    ],
  });
  return createSession(template, t0);
}

const ids = (habits: Habit[]) => habits.map((h) => h.id);

describe('createSession', () => {
  test('starts at the first active habit', () => {
    const session = morningSession();
    expect(session.templateId).toBe('tpl-1');
    expect(session.templateColor).toBe('#FF9500');
    expect(session.startedAt).toBe(t0.toISOString());
    expect(ids(activeHabits(session))).toEqual(['a', 'b', 'c']);
    expect(currentHabit(session)?.id).toBe('a');
    expect(sessionProgress(session)).toBe(0);
    expect(isSessionCompleted(session)).toBe(false);
  });

  test('treats an empty routine as fully progressed', () => {
    const session = createSession(createRoutineTemplate({ name: 'Empty' }), t0);
    expect(sessionProgress(session)).toBe(1);
    expect(currentHabit(session)).toBeNull();
    expect(completeCurrentHabit(session)).toBe(session);
  });
});

describe('completing and skipping', () => {
  test('records completions and advances', () => {
    let session = completeCurrentHabit(morningSession(), { duration: 40, notes: 'ok', now: at(40) });
    expect(session.currentHabitIndex).toBe(1);
    expect(session.completions[0]).toMatchObject({
      habitId: 'a',
      duration: 40,
      notes: 'ok',
      isSkipped: false,
      completedAt: at(40).toISOString(),
    });
    expect(sessionProgress(session)).toBeCloseTo(1 / 3);

    session = skipCurrentHabit(session, { reason: 'tired', now: at(50) });
    expect(session.currentHabitIndex).toBe(2);
    expect(session.completions[1]).toMatchObject({ habitId: 'b', duration: 0, isSkipped: true, notes: 'tired' });
  });

  test('sets completedAt on the last habit and then ignores further steps', () => {
    let session = morningSession();
    session = completeCurrentHabit(session, { now: at(10) });
    session = skipCurrentHabit(session, { now: at(20) });
    session = completeCurrentHabit(session, { now: at(30) });

    expect(session.currentHabitIndex).toBe(2);
    expect(session.completedAt).toBe(at(30).toISOString());
    expect(isSessionCompleted(session)).toBe(true);
    expect(sessionProgress(session)).toBe(1);
    expect(completionCounts(session)).toEqual({ completed: 2, skipped: 1 });
    expect(completeCurrentHabit(session)).toBe(session);
    expect(skipCurrentHabit(session)).toBe(session);
  });

  test('measures duration up to completion', () => {
    const running = morningSession();
    expect(sessionDuration(running, at(330))).toBe(330);
    const finished = forceCompleteSession(running, at(90));
    expect(sessionDuration(finished, at(500))).toBe(90);
    expect(forceCompleteSession(finished, at(200))).toBe(finished);
  });
});

describe('navigation', () => {
  test('steps back and drops the completion of the habit it lands on', () => {
    let session = morningSession();
    session = completeCurrentHabit(session, { now: at(10) });
    session = completeCurrentHabit(session, { now: at(20) });

    session = goToPreviousHabit(session);
    expect(session.currentHabitIndex).toBe(1);
    expect(session.completions.map((c) => c.habitId)).toEqual(['a']);

    session = goToPreviousHabit(goToPreviousHabit(session));
    expect(session.currentHabitIndex).toBe(0);
    expect(session.completions).toEqual([]);
  });

  test('reopens a finished session on its last habit', () => {
    let session = morningSession();
    session = completeCurrentHabit(session, { now: at(10) });
    session = completeCurrentHabit(session, { now: at(20) });
    session = completeCurrentHabit(session, { now: at(30) });

    session = goToPreviousHabit(session);
    expect(session.completedAt).toBeNull();
    expect(session.currentHabitIndex).toBe(2);
    expect(session.completions.map((c) => c.habitId)).toEqual(['a', 'b']);
  });

  test('jumps only to valid indexes', () => {
    const session = morningSession();
    expect(goToHabit(session, 2).currentHabitIndex).toBe(2);
    expect(goToHabit(session, 3)).toBe(session);
    expect(goToHabit(session, -1)).toBe(session);
    expect(goToHabit(session, 1.5)).toBe(session);
  });
});

describe('session modifications', () => {
  test('replays added, removed, modified and reordered changes in order', () => {
    let session = morningSession();
    session = addSessionHabit(session, habit('d', 10), at(1));
    expect(ids(activeHabits(session))).toEqual(['a', 'b', 'c', 'd']);

    session = removeSessionHabit(session, 'b', at(2));
    expect(ids(activeHabits(session))).toEqual(['a', 'c', 'd']);

    session = modifySessionHabit(session, { ...habit('c', 2), name: 'Cold shower' }, at(3));
    expect(activeHabits(session).map((h) => h.name)).toEqual(['A', 'Cold shower', 'D']);

    const [a, c, d] = activeHabits(session);
    session = reorderSessionHabits(session, [{ ...d, order: 0 }, { ...a, order: 1 }, { ...c, order: 2 }], at(4));
    expect(ids(activeHabits(session))).toEqual(['d', 'a', 'c']);
    expect(session.modifications.map((m) => m.change.type)).toEqual(['added', 'removed', 'modified', 'reordered']);
    expect(session.templateHabits).toHaveLength(4);
  });
});

describe('injectConditionalPath', () => {
  const pathA = habit('p1', 0);
  const pathB = habit('p2', 1, { kind: 'timer', defaultDuration: 120 });
  const yes = createConditionalOption('Yes', [pathA, pathB]);
  const no = createConditionalOption('No');

  function questionSession() {
    const question = habit('q', 0, { kind: 'conditional', info: { question: 'Sore today?', options: [yes, no] } });
    const template = createRoutineTemplate({ name: 'Gym', habits: [question, habit('z', 1)] });
    return createSession(template, t0);
  }

  test('splices the chosen path after the question and moves into it', () => {
    const session = injectConditionalPath(questionSession(), 'q', yes, at(5));
    const habits = activeHabits(session);

    expect(habits.map((h) => h.name)).toEqual(['Q', 'P1', 'P2', 'Z']);
    expect(habits.map((h) => h.order)).toEqual([0, 1, 2, 3]);
    expect(habits[1].id).not.toBe('p1');
    expect(session.currentHabitIndex).toBe(1);
    expect(session.completions).toHaveLength(1);
    expect(session.completions[0]).toMatchObject({ habitId: 'q', notes: 'Selected: Yes', isSkipped: false });
  });

  test('moves straight on for an empty path', () => {
    const session = injectConditionalPath(questionSession(), 'q', no, at(5));
    expect(ids(activeHabits(session))).toEqual(['q', 'z']);
    expect(session.modifications).toEqual([]);
    expect(currentHabit(session)?.id).toBe('z');
    expect(session.completions[0].notes).toBe('Selected: No');
  });

  test('ignores an unknown habit', () => {
    const session = questionSession();
    expect(injectConditionalPath(session, 'missing', yes, at(5))).toBe(session);
  });
});
