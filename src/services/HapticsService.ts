import { isDevEnvironment } from '../utils/getEnv';

/**
 * HapticsService
 * --------------
 * Semantic haptics for the routine screens.
 *
 * Call sites name *what happened* (`habit.complete`, `timer.start`) and this
 * layer decides how it feels, throttles bursts and honours Reduce Motion.
 * The physical feedback comes from a driver the host installs with
 * `setDriver`; without one every trigger is a no-op.
 */

export type HapticsEvent =
  // Light touches
  | 'selection'
  | 'item.toggle.on'
  | 'item.toggle.off'
  // Habit flow
  | 'habit.complete'
  | 'habit.skip'
  | 'habit.undo'
  | 'timer.start'
  | 'timer.stop'
  | 'routine.start'
  | 'destructive.confirm'
  // Outcomes
  | 'outcome.success'
  | 'outcome.bigSuccess'
  | 'outcome.warning'
  | 'outcome.error';

export type HapticFeedback = 'selection' | 'light' | 'medium' | 'heavy' | 'success' | 'warning' | 'error';

export type HapticsDriver = {
  perform: (feedback: HapticFeedback) => void | Promise<void>;
  /** Optional; without it Reduce Motion is treated as off. */
  isReduceMotionEnabled?: () => boolean | Promise<boolean>;
};

type ReduceMotionPolicy = 'respect' | 'ignore';

type TriggerOptions = {
  /** Fire even when haptics are switched off in settings. */
  force?: boolean;
  reduceMotionPolicy?: ReduceMotionPolicy;
};

let driver: HapticsDriver | null = null;
let isEnabled = true;
let reduceMotionEnabled: boolean | null = null;
let hasWarnedMissingDriver = false;

const DEFAULT_THROTTLE_MS = 80;
const throttleMsByEvent: Partial<Record<HapticsEvent, number>> = {
  selection: 80,
  'item.toggle.on': 60,
  'item.toggle.off': 60,
  'habit.complete': 120,
  'habit.skip': 120,
  'habit.undo': 120,
  // Outcomes are never swallowed.
  'outcome.success': 0,
  'outcome.bigSuccess': 0,
  'outcome.warning': 0,
  'outcome.error': 0,
};

// Decorative feedback that Reduce Motion turns off. Confirmations and outcomes stay.
const suppressedWhenReduceMotion = new Set<HapticsEvent>([
  'selection',
  'item.toggle.on',
  'item.toggle.off',
  'habit.undo',
  'timer.start',
  'timer.stop',
]);

const lastFiredAtByEvent = new Map<HapticsEvent, number>();

function shouldThrottle(event: HapticsEvent): boolean {
  const now = Date.now();
  const throttleMs = throttleMsByEvent[event] ?? DEFAULT_THROTTLE_MS;
  if (throttleMs <= 0) {
    lastFiredAtByEvent.set(event, now);
    return false;
  }
  const last = lastFiredAtByEvent.get(event);
  if (last !== undefined && now - last < throttleMs) return true;
  lastFiredAtByEvent.set(event, now);
  return false;
}

/** The feedback sequence each event plays. */
export function feedbackForEvent(event: HapticsEvent): HapticFeedback[] {
  switch (event) {
    case 'selection':
    case 'item.toggle.on':
    case 'item.toggle.off':
    case 'habit.undo':
      return ['selection'];
    case 'habit.complete':
    case 'timer.start':
    case 'timer.stop':
      return ['light'];
    case 'habit.skip':
    case 'routine.start':
      return ['medium'];
    case 'destructive.confirm':
      return ['heavy'];
    case 'outcome.success':
      return ['success'];
    case 'outcome.bigSuccess':
      return ['heavy', 'success'];
    case 'outcome.warning':
      return ['warning'];
    case 'outcome.error':
      return ['error'];
    default: {
      const _exhaustive: never = event;
      return _exhaustive;
    }
  }
}

async function refreshReduceMotionFlag(): Promise<void> {
  const probe = driver?.isReduceMotionEnabled;
  if (!probe) {
    reduceMotionEnabled = null;
    return;
  }
  try {
    reduceMotionEnabled = Boolean(await probe());
  } catch (error) {
    // Unknown is treated as off.
    reduceMotionEnabled = null;
    if (isDevEnvironment()) console.warn('[haptics] could not read Reduce Motion', { error });
  }
}

export const HapticsService = {
  /** Installs the driver and reads Reduce Motion. Safe to call again with a new driver. */
  async init(params: { driver?: HapticsDriver | null; enabled?: boolean } = {}) {
    if (params.driver !== undefined) driver = params.driver;
    if (params.enabled !== undefined) isEnabled = params.enabled;
    await refreshReduceMotionFlag();
    if (isDevEnvironment() && !driver && !hasWarnedMissingDriver) {
      hasWarnedMissingDriver = true;
      console.warn('[haptics] no haptics driver set; semantic haptics will be a no-op.');
    }
  },

  setDriver(next: HapticsDriver | null) {
    driver = next;
  },

  setEnabled(enabled: boolean) {
    isEnabled = Boolean(enabled);
  },

  getEnabled() {
    return isEnabled;
  },

  /** Hosts call this when the accessibility setting changes. */
  setReduceMotionEnabled(enabled: boolean | null) {
    reduceMotionEnabled = enabled;
  },

  getDebugState() {
    return {
      enabled: isEnabled,
      reduceMotionEnabled,
      driverInstalled: driver !== null,
    };
  },

  /** Clears throttle history. Tests only. */
  resetThrottle() {
    lastFiredAtByEvent.clear();
  },

  async trigger(event: HapticsEvent, options?: TriggerOptions): Promise<void> {
    const force = Boolean(options?.force);
    const reduceMotionPolicy: ReduceMotionPolicy = options?.reduceMotionPolicy ?? 'respect';

    if (!force && !isEnabled) return;
    if (reduceMotionPolicy === 'respect' && reduceMotionEnabled === true && suppressedWhenReduceMotion.has(event)) {
      return;
    }
    const current = driver;
    if (!current) return;
    if (shouldThrottle(event)) return;

    try {
      for (const feedback of feedbackForEvent(event)) {
        await current.perform(feedback);
      }
    } catch (error) {
      if (isDevEnvironment()) {
        console.warn('[haptics] trigger failed', { event, error });
      }
    }
  },
};
