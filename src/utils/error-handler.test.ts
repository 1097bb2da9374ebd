import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { ErrorHandler, HandledError } from './error-handler.js';

describe('ErrorHandler', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('reads messages from errors and anything else', () => {
    expect(ErrorHandler.getErrorMessage(new HandledError('Cannot read x', 'cli.input'))).toBe('Cannot read x');
    expect(ErrorHandler.getErrorMessage(42)).toBe('42');
    expect(ErrorHandler.getStackTrace('not an error')).toBeUndefined();
  });

  it('writes the context and message to stderr', () => {
    const write = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    ErrorHandler.handle(new Error('Boom'), { context: 'main', includeStack: false });

    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0][0])).toMatch(/Error in main:[\s\S]*Boom/);
  });

  it('stays quiet when asked to', () => {
    const write = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    ErrorHandler.handle(new Error('Boom'), { silent: true });
    expect(write).not.toHaveBeenCalled();
  });
});
