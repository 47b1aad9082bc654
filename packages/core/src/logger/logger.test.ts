import { CollectingLogger, createLogger } from './logger';

describe('createLogger', () => {
  const originalLevel = process.env['LOG_LEVEL'];

  afterEach(() => {
    jest.restoreAllMocks();
    if (originalLevel === undefined) {
      delete process.env['LOG_LEVEL'];
    } else {
      process.env['LOG_LEVEL'] = originalLevel;
    }
  });

  it('should prefix messages and drop those below the level', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    const logger = createLogger('[Scan] ', 'warn');
    logger.info('listing');
    logger.warn('slow directory', '/tmp');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[Scan] slow directory', '/tmp');
  });

  it('should be silent under NODE_ENV=test unless LOG_LEVEL says otherwise', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    delete process.env['LOG_LEVEL'];

    createLogger('[Scan] ').error('hidden');
    expect(error).not.toHaveBeenCalled();

    process.env['LOG_LEVEL'] = 'error';
    createLogger('[Scan] ').error('shown');
    expect(error).toHaveBeenCalledWith('[Scan] shown');
  });

  it('should ignore an unknown LOG_LEVEL', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    process.env['LOG_LEVEL'] = 'verbose';

    createLogger().error('hidden');

    expect(error).not.toHaveBeenCalled();
  });
});

describe('CollectingLogger', () => {
  it('should record entries by level', () => {
    const logger = new CollectingLogger();

    logger.warn('first');
    logger.error('second', 42);
    logger.warn('third');

    expect(logger.messages()).toEqual(['first', 'second', 'third']);
    expect(logger.messages('warn')).toEqual(['first', 'third']);
    expect(logger.entries[1]).toEqual({ level: 'error', message: 'second', args: [42] });

    logger.clear();
    expect(logger.entries).toEqual([]);
  });
});
