import { DEFAULT_SESSION_CONFIG } from '@/config/session.config';
import type { SessionConfigRepository } from '@/lib/db/repositories';
import { ConfigurationError } from '@/lib/errors';
import { hasConfigChanged } from '@/lib/utils/session-config';
import { sessionConfigSchema } from '@/lib/validators';
import type { SessionConfig } from '@/types';

export class SessionConfigService {
  constructor(
    private readonly repository: SessionConfigRepository,
    private readonly defaults: SessionConfig = DEFAULT_SESSION_CONFIG,
  ) {}

  async getConfig(): Promise<SessionConfig> {
    return this.repository.load(this.defaults);
  }

  /** Merges `patch` into the remembered configuration; writes only on change. */
  async patchConfig(patch: Partial<SessionConfig>): Promise<SessionConfig> {
    const current = await this.repository.load(this.defaults);
    const candidate = { ...current, ...patch };
    const result = sessionConfigSchema.safeParse(candidate);
    if (!result.success) {
      throw new ConfigurationError('Invalid session configuration', result.error.flatten());
    }

    const merged: SessionConfig = result.data;
    if (!hasConfigChanged(merged, current)) {
      return current;
    }

    await this.repository.save(merged);
    return merged;
  }

  async resetConfig(): Promise<SessionConfig> {
    await this.repository.clear();
    await this.repository.save(this.defaults);
    return this.defaults;
  }
}

