import * as fs from 'fs';

import { loadEnvFile } from '@/utils/env-file';

jest.mock('fs', () => ({
  readFileSync: jest.fn(),
}));

const mockReadFileSync = fs.readFileSync as jest.MockedFunction<typeof fs.readFileSync>;

function errnoError(code: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`${code}: failed`);
  error.code = code;
  return error;
}

describe('loadEnvFile', () => {
  it('parses a .env file', () => {
    mockReadFileSync.mockReturnValue(`
# Jenkins settings
JENKINS_URL=https://ci.example.com
JENKINS_AUTH=builder:test-token
`);

    expect(loadEnvFile('/path/to/jenkins.env')).toEqual({
      success: true,
      values: {
        JENKINS_URL: 'https://ci.example.com',
        JENKINS_AUTH: 'builder:test-token',
      },
    });
  });

  it('handles an empty file', () => {
    mockReadFileSync.mockReturnValue('');
    expect(loadEnvFile('/path/to/empty.env')).toEqual({ success: true, values: {} });
  });

  it('keeps equals signs inside values', () => {
    mockReadFileSync.mockReturnValue('JENKINS_URL=https://ci.example.com/?a=b');
    expect(loadEnvFile('/x.env').values).toEqual({ JENKINS_URL: 'https://ci.example.com/?a=b' });
  });

  it.each([
    ['ENOENT', 'Config file not found: /x.env'],
    ['EACCES', 'Permission denied reading config file: /x.env'],
    ['EISDIR', 'Config file is a directory: /x.env'],
  ])('reports %s', (code, message) => {
    mockReadFileSync.mockImplementation(() => {
      throw errnoError(code);
    });

    expect(loadEnvFile('/x.env')).toEqual({ success: false, error: message });
  });

  it('reports other failures with their message', () => {
    mockReadFileSync.mockImplementation(() => {
      throw new Error('disk on fire');
    });

    expect(loadEnvFile('/x.env')).toEqual({
      success: false,
      error: 'Failed to read config file /x.env: disk on fire',
    });
  });
});
