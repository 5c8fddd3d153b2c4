import { Benchmark } from '../../logging/Benchmark';
import { LoggerFactory } from '../../logging/LoggerFactory';
import { TsLogFactory } from '../../logging/node/TsLogFactory';
import { ConsoleLoggerFactory } from '../../logging/web/ConsoleLoggerFactory';

describe('Console logger factory', () => {
  let debugSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    debugSpy = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should keep the level of every module apart', () => {
    const sut = new ConsoleLoggerFactory();

    sut.logLevel('debug', 'Storage');

    expect(sut.getOptions('Storage')).toEqual({ minLevel: 'debug' });
    expect(sut.getOptions('Querier')).toEqual({ minLevel: 'info' });
    expect(sut.getOptions()).toEqual({ minLevel: 'info' });
  });

  it('should write messages at or above the minimum level', () => {
    const sut = new ConsoleLoggerFactory();
    sut.logLevel('debug', 'Storage');
    const logger = sut.create('Storage');

    logger.debug('stored', 42);
    logger.trace('hidden');

    expect(debugSpy).toHaveBeenCalledTimes(1);
    expect(debugSpy.mock.calls[0][0]).toMatch(/^\S+ DEBUG \[Storage\] stored$/);
    expect(debugSpy.mock.calls[0][1]).toEqual(42);
  });

  it('should apply global options to registered loggers', () => {
    const sut = new ConsoleLoggerFactory();
    const logger = sut.create('Querier');

    sut.logLevel('fatal');
    logger.error('hidden');
    logger.fatal('shown');

    expect(sut.getOptions('Querier')).toEqual({ minLevel: 'fatal' });
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toMatch(/^\S+ FATAL \[Querier\] shown$/);
  });

  it('should create a single logger per module', () => {
    const sut = new ConsoleLoggerFactory();

    expect(sut.create('Api')).toBe(sut.create('Api'));
    expect(sut.create('Api')).not.toBe(sut.create());
  });
});

describe('TsLog factory', () => {
  it('should start with the default options', () => {
    const sut = new TsLogFactory();

    expect(sut.getOptions().minLevel).toEqual('debug');
  });

  it('should register options of a module before its logger is created', () => {
    const sut = new TsLogFactory();

    sut.logLevel('warn', 'Querier');
    sut.create('/contracts/src/Querier.ts');

    expect(sut.getOptions('Querier').minLevel).toEqual('warn');
    expect(sut.getOptions('Querier').name).toEqual('Querier');
    expect(sut.getOptions('Storage').minLevel).toEqual('debug');
  });

  it('should merge options given for a module before its logger is created', () => {
    const sut = new TsLogFactory();

    sut.setOptions({ displayLoggerName: false }, 'Api');
    sut.logLevel('error', 'Api');
    sut.logLevel('warn', __filename);

    expect(sut.getOptions('Api').displayLoggerName).toBe(false);
    expect(sut.getOptions('Api').minLevel).toEqual('error');
    expect(sut.getOptions('logging.test').minLevel).toEqual('warn');
  });

  it('should update the settings of registered loggers', () => {
    const sut = new TsLogFactory();
    const logger = sut.create('Storage');

    sut.logLevel('error');

    expect(sut.create('Storage')).toBe(logger);
    expect(sut.getOptions('Storage').minLevel).toEqual('error');
  });
});

describe('Logger factory', () => {
  const originalFactory = LoggerFactory.INST;

  afterEach(() => {
    LoggerFactory.use(originalFactory);
  });

  it('should use the console logger factory by default', () => {
    expect(LoggerFactory.INST).toBeInstanceOf(ConsoleLoggerFactory);
  });

  it('should allow to swap the factory', () => {
    const factory = new TsLogFactory();

    LoggerFactory.use(factory);

    expect(LoggerFactory.INST).toBe(factory);
  });
});

describe('Benchmark', () => {
  it('should report elapsed time in milliseconds', () => {
    const sut = Benchmark.measure();

    expect(sut.elapsed()).toMatch(/^\d+ms$/);
    expect(sut.elapsedMs()).toBeGreaterThanOrEqual(0);
  });
});
