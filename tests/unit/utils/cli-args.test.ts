import * as fs from 'fs';

import { ConfigurationError } from '@/jenkins/errors';
import { getHelpText, getVersion, parseCliArgs } from '@/utils/cli-args';

jest.mock('fs', () => ({
  readFileSync: jest.fn(),
}));

const mockReadFileSync = fs.readFileSync as jest.MockedFunction<typeof fs.readFileSync>;

describe('parseCliArgs', () => {
  describe('boolean flags', () => {
    it('defaults every flag to false', () => {
      expect(parseCliArgs([])).toEqual({ verbose: false, help: false, version: false });
    });

    it.each(['-h', '--help'])('parses %s', (flag) => {
      expect(parseCliArgs([flag]).help).toBe(true);
    });

    it.each(['-V', '--version'])('parses %s', (flag) => {
      expect(parseCliArgs([flag]).version).toBe(true);
    });

    it('parses -v as verbose', () => {
      const result = parseCliArgs(['-v']);
      expect(result.verbose).toBe(true);
      expect(result.version).toBe(false);
    });
  });

  describe('value flags', () => {
    it('parses every option and the project', () => {
      const result = parseCliArgs([
        '-H',
        'https://ci.example.com',
        '-b',
        'master',
        '-F',
        'smartos',
        '-u',
        'builder:test-token',
        '-g',
        'smartos-live',
        '-c',
        '/etc/jenkins.env',
        'platform',
      ]);

      expect(result).toEqual({
        url: 'https://ci.example.com',
        branch: 'master',
        platformFlavor: 'smartos',
        auth: 'builder:test-token',
        gitRepo: 'smartos-live',
        config: '/etc/jenkins.env',
        project: 'platform',
        verbose: false,
        help: false,
        version: false,
      });
    });

    it('accepts the project before the options', () => {
      const result = parseCliArgs(['headnode', '-g', 'sdc-headnode', '-b', 'release-1']);
      expect(result.project).toBe('headnode');
      expect(result.gitRepo).toBe('sdc-headnode');
      expect(result.branch).toBe('release-1');
    });

    it('parses --config and --config=value', () => {
      expect(parseCliArgs(['--config', 'a.env']).config).toBe('a.env');
      expect(parseCliArgs(['--config=b.env']).config).toBe('b.env');
    });

    it('takes a value that looks like a flag verbatim', () => {
      expect(parseCliArgs(['-b', '-weird-branch']).branch).toBe('-weird-branch');
    });

    it('lets a later flag override an earlier one', () => {
      expect(parseCliArgs(['-b', 'one', '-b', 'two']).branch).toBe('two');
    });
  });

  describe('errors', () => {
    it('rejects a flag with no value', () => {
      expect(() => parseCliArgs(['-g'])).toThrow('Option -g requires a value');
    });

    it('rejects an unknown flag', () => {
      expect(() => parseCliArgs(['-x'])).toThrow('Unknown option: -x');
    });

    it('rejects a second positional argument', () => {
      expect(() => parseCliArgs(['platform', 'headnode'])).toThrow('Unexpected argument: headnode');
    });

    it('raises usage errors', () => {
      try {
        parseCliArgs(['--token']);
        throw new Error('expected parseCliArgs to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        expect((error as ConfigurationError).exitCode).toBe(2);
      }
    });
  });
});

describe('getVersion', () => {
  it('returns the version from package.json', () => {
    mockReadFileSync.mockReturnValue(JSON.stringify({ version: '1.2.3' }));
    expect(getVersion()).toBe('1.2.3');
  });

  it('tries the next path when the first fails', () => {
    mockReadFileSync
      .mockImplementationOnce(() => {
        throw new Error('ENOENT');
      })
      .mockReturnValueOnce(JSON.stringify({ version: '2.0.0' }));

    expect(getVersion()).toBe('2.0.0');
    expect(mockReadFileSync).toHaveBeenCalledTimes(2);
  });

  it('returns unknown when no package.json has a version', () => {
    mockReadFileSync.mockReturnValue(JSON.stringify({ name: 'test-package' }));
    expect(getVersion()).toBe('unknown');
  });

  it('returns unknown on invalid JSON', () => {
    mockReadFileSync.mockReturnValue('not valid json');
    expect(getVersion()).toBe('unknown');
  });
});

describe('getHelpText', () => {
  beforeEach(() => {
    mockReadFileSync.mockReturnValue(JSON.stringify({ version: '1.0.0' }));
  });

  it('starts with the name and version', () => {
    expect(getHelpText().split('\n')[0]).toBe('jenkins-build-trigger v1.0.0');
  });

  it('documents every option', () => {
    const help = getHelpText();
    for (const flag of ['-H <url>', '-b <branch>', '-F <flavor>', '-u <user:token>', '-g <gitrepo>', '-v ']) {
      expect(help).toContain(flag);
    }
  });

  it('documents the environment variables', () => {
    const help = getHelpText();
    expect(help).toContain('JENKINS_URL         Jenkins server URL, overridden by -H');
    expect(help).toContain('JENKINS_AUTH');
    expect(help).toContain('TRACE');
  });
});
