import { describe, expect, it, jest } from '@jest/globals';

import { createLogger } from '@/lib/utils/logger';

const createSink = () => ({
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
});

describe('createLogger', () => {
  it('prefixes messages with the scope', () => {
    const sink = createSink();
    const logger = createLogger({ scope: 'highscores', sink });

    logger.warn('file is corrupt', 42);

    expect(sink.warn).toHaveBeenCalledWith('[highscores] file is corrupt', 42);
  });

  it('drops debug lines unless enabled', () => {
    const sink = createSink();
    createLogger({ scope: 'engine', sink }).debug('hidden');
    createLogger({ scope: 'engine', sink, debug: true }).debug('shown');

    expect(sink.debug).toHaveBeenCalledTimes(1);
    expect(sink.debug).toHaveBeenCalledWith('[engine] shown');
  });
});
