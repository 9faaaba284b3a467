/**
 * Logger Tests
 */

import { Logger, LogLevel, enableDebugLogging, disableLogging } from './logger';

describe('Logger', () => {
  let log: jest.SpyInstance;
  let warn: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    Logger.setLevel(LogLevel.WARN);
    jest.restoreAllMocks();
  });

  it('should show only warnings and errors at the default level', () => {
    Logger.debug('solver pass');
    Logger.info('arranged');
    Logger.warn('sink rejected');
    Logger.error('bad settings');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[WARN] sink rejected');
    expect(error).toHaveBeenCalledWith('[ERROR] bad settings');
  });

  it('should trace debug output once debug logging is enabled', () => {
    enableDebugLogging();
    Logger.debug('grid 2x2', 4);

    expect(log).toHaveBeenCalledWith('[DEBUG] grid 2x2', 4);
  });

  it('should print nothing once logging is disabled', () => {
    disableLogging();
    Logger.warn('sink rejected');
    Logger.error('bad settings');

    expect(warn).not.toHaveBeenCalled();
    expect(error).not.toHaveBeenCalled();
  });
});
