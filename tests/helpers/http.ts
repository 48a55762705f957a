export interface FakeResponse {
  ok: boolean;
  status: number;
  text: () => Promise<string>;
}

export interface FakeRequestInit {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
}

export type FetchFn = (url: string, init?: FakeRequestInit) => Promise<FakeResponse>;

export function response(status: number, body: unknown = ''): FakeResponse {
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  return {
    ok: status >= 200 && status < 300,
    status,
    text: async () => text,
  };
}


export function requestBody(init: FakeRequestInit | undefined): unknown {
  return init?.body ? JSON.parse(init.body) : undefined;
}
