import { createLogger, errorMessage, parseLogLevel, setLogFile, setLogLevel } from './logger';

describe('createLogger', () => {
  beforeEach(() => {
    jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    setLogLevel('INFO');
    setLogFile(undefined);
    jest.restoreAllMocks();
  });

  // Test: Messages are tagged with the component
  it('should prefix messages with the component tag', () => {
    // Arrange
    const logger = createLogger('Inventory API');

    // Act
    logger.info('Fetched 3 warehouses');
    logger.warn('Slow response');
    logger.critical('Agent stopped');

    // Assert
    expect(console.log).toHaveBeenCalledWith('[Inventory API] Fetched 3 warehouses');
    expect(console.warn).toHaveBeenCalledWith('[Inventory API] Slow response');
    expect(console.error).toHaveBeenCalledWith('[Inventory API] CRITICAL: Agent stopped');
  });

  // Test: Messages below the level are dropped
  it('should drop messages below the configured level', () => {
    // Arrange
    const logger = createLogger('Core Agent');

    // Act
    logger.debug('hidden at INFO');
    setLogLevel('ERROR');
    logger.warn('hidden at ERROR');
    logger.error('shown');
    setLogLevel('DEBUG');
    logger.debug('shown at DEBUG');

    // Assert
    expect(console.warn).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith('[Core Agent] shown');
    expect(console.debug).toHaveBeenCalledTimes(1);
    expect(console.debug).toHaveBeenCalledWith('[Core Agent] shown at DEBUG');
  });
});

describe('setLogFile', () => {
  afterEach(() => {
    setLogFile(undefined);
    jest.restoreAllMocks();
  });

  // Test: Enabled messages are copied to the file with time, component and level
  it('should write enabled messages to the log file', () => {
    // Arrange
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const sink = { write: jest.fn() };
    setLogFile(sink);
    const logger = createLogger('Inventory API');

    // Act
    logger.debug('hidden at INFO');
    logger.warn('Slow response');

    // Assert
    expect(sink.write).toHaveBeenCalledTimes(1);
    expect(sink.write).toHaveBeenCalledWith(
      expect.stringMatching(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z - Inventory API - WARNING - Slow response$/)
    );
  });
});

describe('parseLogLevel', () => {
  it('should accept level names case-insensitively, including WARN', () => {
    expect(parseLogLevel('debug')).toBe('DEBUG');
    expect(parseLogLevel(' Warn ')).toBe('WARNING');
    expect(parseLogLevel('CRITICAL')).toBe('CRITICAL');
    expect(parseLogLevel('verbose')).toBeUndefined();
  });
});

describe('errorMessage', () => {
  it('should read messages from errors and stringify anything else', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
