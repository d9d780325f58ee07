import axios from 'axios';

import * as auth from '@/jenkins/auth';
import {
  CRUMB_ISSUER_PATH,
  CRUMB_XPATH,
  JenkinsClient,
  encodeBuildForm,
  parseCrumb,
} from '@/jenkins/client';
import { ConfigurationError, TransportError } from '@/jenkins/errors';

jest.mock('axios');
jest.mock('@/utils/logger');

const mockedAxios = axios as jest.Mocked<typeof axios>;

const credentials = { username: 'builder', token: 'test-token' };

describe('parseCrumb', () => {
  it('splits field and value on the first colon', () => {
    expect(parseCrumb('Jenkins-Crumb:0123abcd')).toEqual({
      field: 'Jenkins-Crumb',
      value: '0123abcd',
    });
  });

  it('ignores surrounding whitespace', () => {
    expect(parseCrumb('  Jenkins-Crumb:a:b\n')).toEqual({ field: 'Jenkins-Crumb', value: 'a:b' });
  });

  it.each(['', 'Jenkins-Crumb', ':abc', 'Jenkins-Crumb:'])('rejects %p', (body) => {
    expect(() => parseCrumb(body)).toThrow(TransportError);
  });
});

describe('encodeBuildForm', () => {
  it('URL-encodes the payload as the json field', () => {
    expect(encodeBuildForm('{"parameter":[]}')).toBe('json=%7B%22parameter%22%3A%5B%5D%7D');
  });

  it('encodes newlines and spaces', () => {
    expect(encodeBuildForm('a b\nc')).toBe('json=a+b%0Ac');
  });
});

describe('JenkinsClient', () => {
  const get = jest.fn();
  const post = jest.fn();
  const requestUse = jest.fn();
  const responseUse = jest.fn();

  beforeEach(() => {
    mockedAxios.create.mockReturnValue({
      get,
      post,
      interceptors: {
        request: { use: requestUse },
        response: { use: responseUse },
      },
    } as unknown as ReturnType<typeof axios.create>);
  });

  it('creates an axios instance with basic auth', () => {
    const client = new JenkinsClient({ baseUrl: 'https://ci.example.com/', credentials });

    expect(client.baseUrl).toBe('https://ci.example.com');
    expect(mockedAxios.create).toHaveBeenCalledWith({
      baseURL: 'https://ci.example.com',
      timeout: 30000,
      auth: { username: 'builder', password: 'test-token' },
    });
  });

  it('installs the tracing interceptors', () => {
    new JenkinsClient({ baseUrl: 'https://ci.example.com', credentials, timeout: 5000 });

    expect(requestUse).toHaveBeenCalledWith(auth.addRequestId);
    expect(responseUse).toHaveBeenCalledWith(auth.logResponse, auth.logAndTransformError);
  });

  it('rejects a non-http server URL', () => {
    expect(() => new JenkinsClient({ baseUrl: 'ftp://ci.example.com', credentials })).toThrow(
      ConfigurationError
    );
    expect(mockedAxios.create).not.toHaveBeenCalled();
  });

  describe('fetchCrumb', () => {
    it('asks the crumb issuer for field:value text', async () => {
      get.mockResolvedValue({ status: 200, data: 'Jenkins-Crumb:feedface', headers: {} });
      const client = new JenkinsClient({ baseUrl: 'https://ci.example.com', credentials });

      await expect(client.fetchCrumb()).resolves.toEqual({
        field: 'Jenkins-Crumb',
        value: 'feedface',
      });
      expect(get).toHaveBeenCalledWith(CRUMB_ISSUER_PATH, {
        params: { xpath: CRUMB_XPATH },
        responseType: 'text',
        headers: { Accept: 'text/plain' },
      });
      expect(CRUMB_XPATH).toBe('concat(//crumbRequestField,":",//crumb)');
    });

    it('propagates transport failures', async () => {
      get.mockRejectedValue(new TransportError('No response from Jenkins'));
      const client = new JenkinsClient({ baseUrl: 'https://ci.example.com', credentials });

      await expect(client.fetchCrumb()).rejects.toThrow('No response from Jenkins');
    });
  });

  describe('postBuild', () => {
    const crumb = { field: 'Jenkins-Crumb', value: 'feedface' };

    it('posts the form-encoded payload with the crumb header', async () => {
      post.mockResolvedValue({
        status: 201,
        data: '',
        headers: { location: 'https://ci.example.com/queue/item/42/' },
      });
      const client = new JenkinsClient({ baseUrl: 'https://ci.example.com', credentials });

      const result = await client.postBuild(
        'https://ci.example.com/job/headnode/build',
        '{"parameter":[]}',
        crumb
      );

      expect(result).toEqual({ status: 201, queueUrl: 'https://ci.example.com/queue/item/42/' });
      expect(post).toHaveBeenCalledWith(
        'https://ci.example.com/job/headnode/build',
        'json=%7B%22parameter%22%3A%5B%5D%7D',
        {
          headers: {
            'Jenkins-Crumb': 'feedface',
            'Content-Type': 'application/x-www-form-urlencoded',
          },
        }
      );
    });

    it('leaves queueUrl unset without a Location header', async () => {
      post.mockResolvedValue({ status: 200, data: '', headers: {} });
      const client = new JenkinsClient({ baseUrl: 'https://ci.example.com', credentials });

      const result = await client.postBuild('https://ci.example.com/job/x/build', '{}', crumb);

      expect(result).toEqual({ status: 200, queueUrl: undefined });
    });
  });
});
