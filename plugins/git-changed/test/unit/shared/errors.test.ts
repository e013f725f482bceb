import {
  ConfigurationError,
  ExternalToolError,
  GitChangedError,
  GitChangedErrorCode,
} from '../../../src/shared/errors.js';

describe('GitChangedError', () => {
  it('creates error with code and message', () => {
    const err = new GitChangedError(GitChangedErrorCode.EXTERNAL_TOOL, 'git is missing');
    expect(err.code).toBe(GitChangedErrorCode.EXTERNAL_TOOL);
    expect(err.message).toBe('git is missing');
    expect(err instanceof Error).toBe(true);
  });

  it('includes optional context', () => {
    const err = new ExternalToolError('fetch failed', { stderr: 'fatal: no remote' });
    expect(err.context).toEqual({ stderr: 'fatal: no remote' });
  });
});

describe('error kinds', () => {
  it('ExternalToolError carries the EXTERNAL_TOOL code', () => {
    const err = new ExternalToolError('boom');
    expect(err).toBeInstanceOf(GitChangedError);
    expect(err.code).toBe('EXTERNAL_TOOL');
    expect(err.name).toBe('ExternalToolError');
  });

  it('ConfigurationError carries the CONFIGURATION code', () => {
    const err = new ConfigurationError('bad ttl');
    expect(err).toBeInstanceOf(GitChangedError);
    expect(err.code).toBe('CONFIGURATION');
    expect(err.name).toBe('ConfigurationError');
  });
});
