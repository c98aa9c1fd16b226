import axios, {
  AxiosError,
  type AxiosInstance,
  type InternalAxiosRequestConfig,
} from "axios";

export type FakeReply = {
  status: number;
  data: unknown;
  headers?: Record<string, string>;
};

export type FakeHandler = (request: InternalAxiosRequestConfig) => FakeReply | Promise<FakeReply>;

export type FakeHttp = {
  http: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
};

/**
 * Axios instance backed by an in-process adapter. Replies with a status of
 * 400 or more are raised as AxiosErrors, as the real adapters do.
 */
export function createFakeHttp(handler: FakeHandler): FakeHttp {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const reply = await handler(config);
      const response = {
        data: reply.data,
        status: reply.status,
        statusText: String(reply.status),
        headers: reply.headers ?? {},
        config,
      };
      if (reply.status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${reply.status}`,
          reply.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
          config,
          undefined,
          response
        );
      }
      return response;
    },
  });
  return { http, requests };
}

export function networkFailure(code: string): never {
  throw new AxiosError(`connect ${code}`, code);
}
