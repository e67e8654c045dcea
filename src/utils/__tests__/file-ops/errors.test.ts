import { TreeError, isConfigurationError, isTreeError } from '@file-ops/errors';

describe('TreeError', () => {
  it('carries a code and details', () => {
    const error = new TreeError('INVALID_ROOT', 'missing', { rootDir: '/nowhere' });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('TreeError');
    expect(error.code).toBe('INVALID_ROOT');
    expect(error.details).toEqual({ rootDir: '/nowhere' });
    expect(isTreeError(error)).toBe(true);
    expect(isTreeError(new Error('plain'))).toBe(false);
  });

  it('separates configuration errors from runtime failures', () => {
    expect(isConfigurationError(new TreeError('UNKNOWN_STYLE', 'x'))).toBe(true);
    expect(isConfigurationError(new TreeError('INVALID_CONFIG', 'x'))).toBe(true);
    expect(isConfigurationError(new TreeError('WRITE_FAILED', 'x'))).toBe(false);
    expect(isConfigurationError(Object.assign(new Error('x'), { code: 'INVALID_ROOT' }))).toBe(false);
  });
});
