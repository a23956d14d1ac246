import { describe, it, expect, beforeEach } from 'vitest';
import { UnknownTokenError } from '@keyrelay/shared';
import { TokenDirectory } from './token-directory.js';

describe('TokenDirectory', () => {
  let now: number;
  let directory: TokenDirectory;

  beforeEach(() => {
    now = 1_000;
    directory = new TokenDirectory({ now: () => now });
  });

  describe('register', () => {
    it('should keep exactly one record when registered twice with the same arguments', async () => {
      const first = await directory.register({ token: 'tok-1', platform: 'ios', channel: 'default' });
      now = 2_000;
      const second = await directory.register({ token: 'tok-1', platform: 'ios', channel: 'default' });

      expect(await directory.count()).toBe(1);
      expect(second).toEqual(first);
      expect(second).toEqual({
        token: 'tok-1',
        sessionId: null,
        platform: 'ios',
        channel: 'default',
        registeredAt: 1_000,
        updatedAt: 1_000,
      });
    });

    it('should default the channel', async () => {
      const record = await directory.register({ token: 'tok-1', platform: 'android' });
      expect(record.channel).toBe('default');
    });

    it('should update platform details without dropping the session link', async () => {
      await directory.register({ token: 'tok-1', platform: 'ios' });
      await directory.link('tok-1', 'S-alice');
      now = 3_000;

      const updated = await directory.register({ token: 'tok-1', platform: 'ios', channel: 'silent' });

      expect(updated.channel).toBe('silent');
      expect(updated.sessionId).toBe('S-alice');
      expect(updated.registeredAt).toBe(1_000);
      expect(updated.updatedAt).toBe(3_000);
    });
  });

  describe('link', () => {
    it('should fail for a token that was never registered', async () => {
      await expect(directory.link('tok-missing', 'S-alice')).rejects.toBeInstanceOf(UnknownTokenError);
    });

    it('should be a no-op when linking to the same session twice', async () => {
      await directory.register({ token: 'tok-1', platform: 'ios' });
      now = 2_000;
      const first = await directory.link('tok-1', 'S-alice');
      now = 3_000;
      const second = await directory.link('tok-1', 'S-alice');

      expect(second).toEqual(first);
      expect(second.updatedAt).toBe(2_000);
      expect(await directory.tokensFor('S-alice')).toHaveLength(1);
    });

    it('should move a token to the most recent session only', async () => {
      await directory.register({ token: 'tok-1', platform: 'ios' });
      await directory.link('tok-1', 'S-alice');
      await directory.link('tok-1', 'S-bob');

      expect(await directory.tokensFor('S-alice')).toEqual([]);
      const bobTokens = await directory.tokensFor('S-bob');
      expect(bobTokens.map((record) => record.token)).toEqual(['tok-1']);
      expect(bobTokens[0]?.sessionId).toBe('S-bob');
    });

    it('should let a session hold several tokens', async () => {
      await directory.register({ token: 'tok-phone', platform: 'ios' });
      await directory.register({ token: 'tok-tablet', platform: 'android' });
      await directory.link('tok-phone', 'S-alice');
      await directory.link('tok-tablet', 'S-alice');

      const tokens = await directory.tokensFor('S-alice');
      expect(tokens.map((record) => record.token)).toEqual(['tok-phone', 'tok-tablet']);
    });
  });

  describe('tokensFor', () => {
    it('should return an empty list when nothing is registered', async () => {
      await expect(directory.tokensFor('S-nobody')).resolves.toEqual([]);
    });

    it('should return copies that do not alter the directory', async () => {
      await directory.register({ token: 'tok-1', platform: 'ios' });
      await directory.link('tok-1', 'S-alice');

      const [record] = await directory.tokensFor('S-alice');
      if (record) record.sessionId = 'S-mallory';

      expect((await directory.get('tok-1'))?.sessionId).toBe('S-alice');
    });
  });

  describe('unlink', () => {
    it('should leave the link alone when the session does not match', async () => {
      await directory.register({ token: 'tok-1', platform: 'ios' });
      await directory.link('tok-1', 'S-alice');

      const record = await directory.unlink('tok-1', 'S-bob');

      expect(record.sessionId).toBe('S-alice');
    });

    it('should clear the link', async () => {
      await directory.register({ token: 'tok-1', platform: 'ios' });
      await directory.link('tok-1', 'S-alice');

      const record = await directory.unlink('tok-1', 'S-alice');

      expect(record.sessionId).toBeNull();
      expect(await directory.tokensFor('S-alice')).toEqual([]);
      expect(await directory.count()).toBe(1);
    });

    it('should fail for an unknown token', async () => {
      await expect(directory.unlink('tok-missing')).rejects.toBeInstanceOf(UnknownTokenError);
    });
  });

  describe('remove and prune', () => {
    it('should delete the record and its link', async () => {
      await directory.register({ token: 'tok-1', platform: 'ios' });
      await directory.link('tok-1', 'S-alice');

      expect(await directory.prune('tok-1', 'invalid_token')).toBe(true);
      expect(await directory.remove('tok-1')).toBe(false);
      expect(await directory.tokensFor('S-alice')).toEqual([]);
      expect(await directory.get('tok-1')).toBeUndefined();
    });
  });
});
