import { isDevEnvironment } from '../utils/getEnv';

/**
 * AccessibilityAnnouncer
 * ----------------------
 * Screen-reader announcements ("Timer started", "Habit completed") routed to
 * whatever the host shell provides. Announcements are delivered one at a time
 * in call order; callers never wait on them.
 */

export type AnnouncementDriver = {
  announce: (message: string) => void | Promise<void>;
};

let driver: AnnouncementDriver | null = null;
let queue: Promise<void> = Promise.resolve();
let hasWarnedMissingDriver = false;

async function deliver(message: string): Promise<void> {
  const current = driver;
  if (!current) {
    if (isDevEnvironment() && !hasWarnedMissingDriver) {
      hasWarnedMissingDriver = true;
      console.warn('[a11y] no announcement driver set; announcements are dropped.');
    }
    return;
  }
  try {
    await current.announce(message);
  } catch (error) {
    console.warn('[a11y] announcement failed', { message, error });
  }
}

export const AccessibilityAnnouncer = {
  setDriver(next: AnnouncementDriver | null) {
    driver = next;
  },

  announce(message: string): void {
    const trimmed = message.trim();
    if (!trimmed) return;
    queue = queue.then(() => deliver(trimmed));
  },

  /** Resolves once everything announced so far has been delivered. */
  flush(): Promise<void> {
    return queue;
  },
};
