import path from 'node:path';

import { describe, expect, it } from '@jest/globals';

import { loadAppConfig, type AppConfig } from '@/config/app.config';
import { ConfigurationError } from '@/lib/errors';

const fallback: AppConfig = {
  debug: false,
  homeDir: '/home/tester/.typing-drill',
  workingDir: '/work',
};

describe('loadAppConfig', () => {
  it('returns the fallback for an empty environment', () => {
    expect(loadAppConfig({}, fallback)).toEqual(fallback);
  });

  it('reads the debug flag and home directory', () => {
    const config = loadAppConfig({ TYPING_DRILL_DEBUG: '1', TYPING_DRILL_HOME: '/tmp/drill-home' }, fallback);

    expect(config.debug).toBe(true);
    expect(config.homeDir).toBe('/tmp/drill-home');
    expect(config.highscoresPath).toBeUndefined();
  });

  it('resolves an explicit highscore file', () => {
    const config = loadAppConfig({ TYPING_DRILL_HIGHSCORES: 'scores.json' }, fallback);

    expect(config.highscoresPath).toBe(path.resolve('scores.json'));
  });

  it('rejects an empty home directory', () => {
    expect(() => loadAppConfig({ TYPING_DRILL_HOME: '   ' }, fallback)).toThrow(ConfigurationError);
  });
});
