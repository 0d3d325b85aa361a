import { DEFAULT_SESSION_CONFIG } from '@/config/session.config';
import { ensureAppError } from '@/lib/errors';
import type { SessionConfigService } from '@/lib/services';
import type { SessionConfig } from '@/types';

import type { AsyncStatus, StoreSetter } from '../types';

export interface SessionConfigSlice {
  config: SessionConfig;
  configStatus: AsyncStatus;
  configError?: string;
  loadConfig: () => Promise<SessionConfig>;
  saveConfig: (config: SessionConfig) => Promise<SessionConfig>;
  resetConfig: () => Promise<SessionConfig>;
}

interface CreateSessionConfigSliceParams {
  set: StoreSetter<SessionConfigSlice>;
  service: SessionConfigService;
}

const mapErrorMessage = (error: unknown): string => {
  const appError = ensureAppError(error);
  return appError.expose ? appError.message : 'Unable to update the session configuration.';
};

export const createSessionConfigSlice = ({
  set,
  service,
}: CreateSessionConfigSliceParams): SessionConfigSlice => ({
  config: DEFAULT_SESSION_CONFIG,
  configStatus: 'idle',

  loadConfig: async (): Promise<SessionConfig> => {
    set({ configStatus: 'loading' });

    try {
      const config = await service.getConfig();
      set({ config, configStatus: 'ready', configError: undefined });
      return config;
    } catch (error) {
      set({ configStatus: 'error', configError: mapErrorMessage(error) });
      throw ensureAppError(error);
    }
  },

  saveConfig: async (config: SessionConfig): Promise<SessionConfig> => {
    try {
      const saved = await service.patchConfig(config);
      set({ config: saved, configStatus: 'ready', configError: undefined });
      return saved;
    } catch (error) {
      set({ configError: mapErrorMessage(error) });
      throw ensureAppError(error);
    }
  },

  resetConfig: async (): Promise<SessionConfig> => {
    try {
      const config = await service.resetConfig();
      set({ config, configStatus: 'ready', configError: undefined });
      return config;
    } catch (error) {
      set({ configError: mapErrorMessage(error) });
      throw ensureAppError(error);
    }
  },
});
