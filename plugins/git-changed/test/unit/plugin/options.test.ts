import { Command, CommanderError } from 'commander';
import { isValidBranchName, parsePluginOptions, registerOptions } from '../../../src/plugin/options.js';
import { ConfigurationError } from '../../../src/shared/errors.js';

function parseArgs(args: string[], defaultTtl = 60): Record<string, unknown> {
  const command = new Command('run').exitOverride().configureOutput({ writeErr: () => {} });
  registerOptions(command, defaultTtl);
  command.parse(args, { from: 'user' });
  return command.opts();
}

describe('isValidBranchName', () => {
  it.each(['main', 'feature/login-form', 'release-1.2', 'users/dev/fix_42'])('accepts %s', name => {
    expect(isValidBranchName(name)).toBe(true);
  });

  it.each(['', '-main', 'a..b', 'has space', 'ends/', 'topic.lock', 'a:b', 'x@{1}', '.hidden', 'a/.b', '@'])(
    'rejects %p',
    name => {
      expect(isValidBranchName(name)).toBe(false);
    }
  );
});

describe('registerOptions', () => {
  it('registers the branch, cache and no-fetch options', () => {
    expect(parseArgs(['--changed-against-branch', 'main', '--changed-fetch-cache', '30', '--changed-no-fetch'])).toEqual({
      changedAgainstBranch: 'main',
      changedFetchCache: 30,
      changedNoFetch: true,
    });
  });

  it('defaults the cache duration', () => {
    expect(parseArgs([], 120)).toEqual({ changedFetchCache: 120 });
  });

  it('accepts a negative integer so validation can report it', () => {
    expect(parseArgs(['--changed-fetch-cache', '-1'])).toEqual({ changedFetchCache: -1 });
  });

  it('rejects a non-integer cache duration at parse time', () => {
    expect(() => parseArgs(['--changed-fetch-cache', 'soon'])).toThrow(CommanderError);
  });
});

describe('parsePluginOptions', () => {
  it('is disabled without a branch', () => {
    expect(parsePluginOptions(parseArgs([]), 60)).toEqual({
      branch: undefined,
      fetchCacheSeconds: 60,
      noFetch: false,
    });
  });

  it('reads the parsed command options', () => {
    const options = parsePluginOptions(parseArgs(['--changed-against-branch', 'main', '--changed-fetch-cache', '0']), 60);
    expect(options).toEqual({ branch: 'main', fetchCacheSeconds: 0, noFetch: false });
  });

  it('rejects a negative cache duration', () => {
    expect(() => parsePluginOptions({ changedAgainstBranch: 'main', changedFetchCache: -1 }, 60)).toThrow(
      new ConfigurationError(
        "Cache duration must be non-negative. Please provide a valid value for '--changed-fetch-cache'."
      )
    );
  });

  it('rejects a malformed branch name', () => {
    expect(() => parsePluginOptions({ changedAgainstBranch: '--upload-pack=evil' }, 60)).toThrow(
      "Malformed branch name. Please provide a valid value for '--changed-against-branch'."
    );
  });

  it('rejects --changed-no-fetch combined with a non-default cache duration', () => {
    const raw = parseArgs(['--changed-against-branch', 'main', '--changed-no-fetch', '--changed-fetch-cache', '10']);

    expect(() => parsePluginOptions(raw, 60)).toThrow(
      "The options '--changed-no-fetch' and '--changed-fetch-cache' cannot be used together. Please choose one."
    );
  });

  it('allows --changed-no-fetch with the default cache duration', () => {
    const raw = parseArgs(['--changed-against-branch', 'main', '--changed-no-fetch']);

    expect(parsePluginOptions(raw, 60)).toEqual({ branch: 'main', fetchCacheSeconds: 60, noFetch: true });
  });
});
