import { describe, expect, it } from '@jest/globals';

import { DEFAULT_SESSION_CONFIG } from '@/config/session.config';
import { ConfigurationError } from '@/lib/errors';
import { SessionConfigService } from '@/lib/services';

import { InMemorySessionConfigRepository } from '../helpers/fixtures';

describe('SessionConfigService', () => {
  it('returns the defaults when nothing is remembered', async () => {
    const service = new SessionConfigService(new InMemorySessionConfigRepository());

    await expect(service.getConfig()).resolves.toEqual(DEFAULT_SESSION_CONFIG);
  });

  it('saves a valid configuration', async () => {
    const repository = new InMemorySessionConfigRepository();
    const service = new SessionConfigService(repository);
    const config = { ...DEFAULT_SESSION_CONFIG, numbers: true };

    await expect(service.patchConfig(config)).resolves.toEqual(config);
    expect(repository.stored).toEqual(config);
  });

  it('rejects an invalid configuration', async () => {
    const repository = new InMemorySessionConfigRepository();
    const service = new SessionConfigService(repository);

    await expect(service.patchConfig({ topN: 0 })).rejects.toBeInstanceOf(ConfigurationError);
    expect(repository.saveCount).toBe(0);
  });

  it('merges a patch into the remembered configuration', async () => {
    const repository = new InMemorySessionConfigRepository();
    const service = new SessionConfigService(repository);

    const patched = await service.patchConfig({ mode: { kind: 'words', count: 25 } });

    expect(patched).toEqual({ ...DEFAULT_SESSION_CONFIG, mode: { kind: 'words', count: 25 } });
    expect(repository.saveCount).toBe(1);
  });

  it('skips saving a patch that changes nothing', async () => {
    const repository = new InMemorySessionConfigRepository();
    const service = new SessionConfigService(repository);

    await service.patchConfig({ numbers: false });

    expect(repository.saveCount).toBe(0);
  });

  it('restores the defaults on reset', async () => {
    const repository = new InMemorySessionConfigRepository();
    const service = new SessionConfigService(repository);
    await service.patchConfig({ numbers: true });

    await expect(service.resetConfig()).resolves.toEqual(DEFAULT_SESSION_CONFIG);
    expect(repository.stored).toEqual(DEFAULT_SESSION_CONFIG);
  });
});
