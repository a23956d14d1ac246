import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SessionDirectory } from './session-directory.js';

describe('SessionDirectory', () => {
  let now: number;
  let directory: SessionDirectory;

  beforeEach(() => {
    now = 1_000;
    directory = new SessionDirectory({ now: () => now });
  });

  describe('markOnline', () => {
    it('should record the handle and presence', () => {
      expect(directory.markOnline('S-alice', 'conn-1')).toBeNull();

      expect(directory.isOnline('S-alice')).toBe(true);
      expect(directory.handleFor('S-alice')).toBe('conn-1');
      expect(directory.presenceFor('S-alice')).toEqual({
        sessionId: 'S-alice',
        connectionHandle: 'conn-1',
        lastSeenAt: 1_000,
      });
    });

    it('should supersede a previous handle', () => {
      directory.markOnline('S-alice', 'conn-1');

      expect(directory.markOnline('S-alice', 'conn-2')).toBe('conn-1');
      expect(directory.handleFor('S-alice')).toBe('conn-2');
      expect(directory.onlineCount()).toBe(1);
    });

    it('should notify online listeners until unsubscribed', () => {
      const listener = vi.fn();
      const unsubscribe = directory.onOnline(listener);

      directory.markOnline('S-alice', 'conn-1');
      unsubscribe();
      directory.markOnline('S-bob', 'conn-2');

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledWith('S-alice', 'conn-1');
    });
  });

  describe('markOffline', () => {
    it('should clear the handle and be idempotent', () => {
      directory.markOnline('S-alice', 'conn-1');

      expect(directory.markOffline('S-alice')).toBe(true);
      expect(directory.markOffline('S-alice')).toBe(false);
      expect(directory.isOnline('S-alice')).toBe(false);
      expect(directory.handleFor('S-alice')).toBeUndefined();
    });

    it('should ignore a superseded handle', () => {
      directory.markOnline('S-alice', 'conn-1');
      directory.markOnline('S-alice', 'conn-2');

      expect(directory.markOffline('S-alice', 'conn-1')).toBe(false);
      expect(directory.handleFor('S-alice')).toBe('conn-2');

      expect(directory.markOffline('S-alice', 'conn-2')).toBe(true);
      expect(directory.isOnline('S-alice')).toBe(false);
    });
  });

  it('should refresh lastSeenAt on touch', () => {
    directory.markOnline('S-alice', 'conn-1');
    now = 5_000;

    directory.touch('S-alice');
    directory.touch('S-nobody');

    expect(directory.presenceFor('S-alice')?.lastSeenAt).toBe(5_000);
    expect(directory.presenceFor('S-nobody')).toBeUndefined();
  });
});
