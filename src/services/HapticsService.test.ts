import { HapticsService, feedbackForEvent, type HapticFeedback } from './HapticsService';

function recordingDriver(reduceMotion = false) {
  const performed: HapticFeedback[] = [];
  return {
    performed,
    driver: {
      perform: (feedback: HapticFeedback) => {
        performed.push(feedback);
      },
      isReduceMotionEnabled: () => reduceMotion,
    },
  };
}

describe('HapticsService', () => {
  let nowMs = 1_000_000;
  let clock: jest.SpyInstance<number, []>;

  beforeEach(() => {
    nowMs = 1_000_000;
    clock = jest.spyOn(Date, 'now').mockImplementation(() => nowMs);
    HapticsService.resetThrottle();
    HapticsService.setEnabled(true);
    HapticsService.setReduceMotionEnabled(null);
  });

  afterEach(() => {
    clock.mockRestore();
  });

  test('maps events to feedback', () => {
    expect(feedbackForEvent('habit.complete')).toEqual(['light']);
    expect(feedbackForEvent('habit.skip')).toEqual(['medium']);
    expect(feedbackForEvent('outcome.bigSuccess')).toEqual(['heavy', 'success']);
  });

  test('plays through the installed driver', async () => {
    const { driver, performed } = recordingDriver();
    await HapticsService.init({ driver });
    await HapticsService.trigger('outcome.bigSuccess');
    expect(performed).toEqual(['heavy', 'success']);
    expect(HapticsService.getDebugState()).toEqual({ enabled: true, reduceMotionEnabled: false, driverInstalled: true });
  });

  test('throttles bursts but never outcomes', async () => {
    const { driver, performed } = recordingDriver();
    await HapticsService.init({ driver });

    await HapticsService.trigger('habit.complete');
    nowMs += 50;
    await HapticsService.trigger('habit.complete');
    nowMs += 100;
    await HapticsService.trigger('habit.complete');
    expect(performed).toEqual(['light', 'light']);

    performed.length = 0;
    await HapticsService.trigger('outcome.error');
    await HapticsService.trigger('outcome.error');
    expect(performed).toEqual(['error', 'error']);
  });

  test('honours the enabled switch unless forced', async () => {
    const { driver, performed } = recordingDriver();
    await HapticsService.init({ driver, enabled: false });
    await HapticsService.trigger('routine.start');
    await HapticsService.trigger('destructive.confirm', { force: true });
    expect(performed).toEqual(['heavy']);
    expect(HapticsService.getEnabled()).toBe(false);
  });

  test('drops decorative feedback under Reduce Motion', async () => {
    const { driver, performed } = recordingDriver(true);
    await HapticsService.init({ driver });
    await HapticsService.trigger('timer.start');
    await HapticsService.trigger('habit.complete');
    await HapticsService.trigger('selection', { reduceMotionPolicy: 'ignore' });
    expect(performed).toEqual(['light', 'selection']);
  });

  test('logs and swallows driver failures', async () => {
    await HapticsService.init({
      driver: {
        perform: () => {
          throw new Error('engine unavailable');
        },
      },
    });
    await expect(HapticsService.trigger('outcome.warning')).resolves.toBeUndefined();
  });

  test('does nothing without a driver', async () => {
    await HapticsService.init({ driver: null });
    await expect(HapticsService.trigger('outcome.success')).resolves.toBeUndefined();
    expect(HapticsService.getDebugState().driverInstalled).toBe(false);
  });
});
