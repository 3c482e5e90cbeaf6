import { Readable } from 'node:stream';

export type CapturedRequest = {
  method: string;
  hostname: string;
  path: string;
  headers: Record<string, string>;
  body?: unknown;
};

export type StubResponse = {
  statusCode: number;
  headers?: Record<string, string>;
  body?: Uint8Array | string;
};

// Answers SDK requests in process so no socket is ever opened
export const stubRequestHandler = (respond: (request: CapturedRequest) => StubResponse) => {
  const requests: CapturedRequest[] = [];

  const requestHandler = {
    handle: async (request: CapturedRequest) => {
      requests.push(request);
      const { statusCode, headers = {}, body = '' } = respond(request);

      return {
        response: {
          statusCode,
          headers,
          body: Readable.from([typeof body === 'string' ? Buffer.from(body, 'utf-8') : Buffer.from(body)]),
        },
      };
    },
    updateHttpClientConfig: () => undefined,
    httpHandlerConfigs: () => ({}),
  };

  return { requestHandler, requests };
};

export const testClientConfig = {
  region: 'ap-southeast-2',
  credentials: { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' },
  maxAttempts: 1,
};
