import { createLogger, describeError } from '@/lib/logging';

describe('logger', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    process.env = { ...originalEnv };
    process.env.LOG_LEVEL = 'debug';
    delete process.env.DEBUG_NAMESPACES;
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
    jest.spyOn(console, 'debug').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.env = originalEnv;
  });

  it('logs info at debug level', () => {
    const logger = createLogger('test');
    logger.info('hello', { value: 1 });

    expect(console.log).toHaveBeenCalledWith('[proxy] [test]', 'hello', { value: 1 });
  });

  it('respects once key', () => {
    const logger = createLogger('test');
    logger.once('dup', 'hello');
    logger.once('dup', 'hello');

    expect(console.log).toHaveBeenCalledTimes(1);
  });

  it('merges child object context', () => {
    const logger = createLogger('test', { scope: 'a' }).child({ reqId: '1' });
    logger.error('boom', { extra: true });

    expect(console.error).toHaveBeenCalledWith(
      '[proxy] [test]',
      'boom',
      expect.objectContaining({ scope: 'a', reqId: '1', extra: true }),
    );
  });

  it('suppresses debug output below threshold unless the namespace root is enabled', () => {
    process.env.LOG_LEVEL = 'warn';
    createLogger('voice:pipeline').debug('hidden');
    expect(console.debug).not.toHaveBeenCalled();

    process.env.DEBUG_NAMESPACES = 'voice';
    createLogger('voice:pipeline').debug('shown');
    expect(console.debug).toHaveBeenCalledWith('[proxy] [voice:pipeline]', 'shown');
  });

  it('drops everything when silent', () => {
    process.env.LOG_LEVEL = 'silent';
    createLogger('test').error('nope');
    expect(console.error).not.toHaveBeenCalled();
  });
});

describe('describeError', () => {
  it('prefers error messages and falls back to json', () => {
    expect(describeError(new Error('bad'))).toBe('bad');
    expect(describeError('plain')).toBe('plain');
    expect(describeError({ message: 'inner' })).toBe('inner');
    expect(describeError({ code: 7 })).toBe('{"code":7}');
  });
});
