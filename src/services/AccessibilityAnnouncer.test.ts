import { AccessibilityAnnouncer } from './AccessibilityAnnouncer';

describe('AccessibilityAnnouncer', () => {
  afterEach(() => {
    AccessibilityAnnouncer.setDriver(null);
  });

  test('delivers trimmed announcements in call order', async () => {
    const heard: string[] = [];
    AccessibilityAnnouncer.setDriver({
      announce: async (message) => {
        await new Promise((resolve) => setTimeout(resolve, message === 'first' ? 5 : 0));
        heard.push(message);
      },
    });

    AccessibilityAnnouncer.announce('  first ');
    AccessibilityAnnouncer.announce('   ');
    AccessibilityAnnouncer.announce('second');
    await AccessibilityAnnouncer.flush();

    expect(heard).toEqual(['first', 'second']);
  });

  test('keeps going after a driver error', async () => {
    const heard: string[] = [];
    AccessibilityAnnouncer.setDriver({
      announce: (message) => {
        if (message === 'boom') throw new Error('speech unavailable');
        heard.push(message);
      },
    });

    AccessibilityAnnouncer.announce('boom');
    AccessibilityAnnouncer.announce('after');
    await AccessibilityAnnouncer.flush();

    expect(heard).toEqual(['after']);
    expect(console.warn).toHaveBeenCalledWith('[a11y] announcement failed', {
      message: 'boom',
      error: expect.any(Error),
    });
  });
});
