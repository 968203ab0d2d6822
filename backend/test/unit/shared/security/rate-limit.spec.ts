import { describe, it, expect } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import { RateLimiter, RateLimitError } from '../../../../src/shared/security/rate-limit';

describe('RateLimiter', () => {
  it('allows up to the limit and throws past it', async () => {
    const limiter = new RateLimiter(new InMemCache(), { prefix: 'rl' });
    const hit = () => limiter.hitOrThrow({ key: 'login:ip:1.2.3.4', limit: 2, windowSeconds: 60 });

    await hit();
    await hit();

    await expect(hit()).rejects.toBeInstanceOf(RateLimitError);
    await expect(hit()).rejects.toMatchObject({ key: 'rl:login:ip:1.2.3.4', limit: 2 });
  });

  it('counts keys independently', async () => {
    const limiter = new RateLimiter(new InMemCache());

    await limiter.hitOrThrow({ key: 'a', limit: 1, windowSeconds: 60 });
    await expect(limiter.hitOrThrow({ key: 'b', limit: 1, windowSeconds: 60 })).resolves.toBeUndefined();
  });

  it('starts a new window once the old one expires', async () => {
    let now = 0;
    const limiter = new RateLimiter(new InMemCache(() => now));

    await limiter.hitOrThrow({ key: 'k', limit: 1, windowSeconds: 10 });
    await expect(limiter.hitOrThrow({ key: 'k', limit: 1, windowSeconds: 10 })).rejects.toBeInstanceOf(
      RateLimitError,
    );

    now = 10_000;
    await expect(limiter.hitOrThrow({ key: 'k', limit: 1, windowSeconds: 10 })).resolves.toBeUndefined();
  });

  it('never throws when disabled', async () => {
    const limiter = new RateLimiter(new InMemCache(), { disabled: true });

    for (let i = 0; i < 5; i++) {
      await limiter.hitOrThrow({ key: 'k', limit: 1, windowSeconds: 60 });
    }
  });
});
