import express from 'express';

export interface TestResponse {
  status: number;
  body: unknown;
}

/** Send one request to the app on an ephemeral port. A string body is sent as-is. */
export async function request(
  app: express.Application,
  method: string,
  path: string,
  body?: unknown,
  headers?: Record<string, string>,
): Promise<TestResponse> {
  return new Promise<TestResponse>((resolve) => {
    const server = app.listen(0, () => {
      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : 0;
      const payload = body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body);

      fetch(`http://127.0.0.1:${port}${path}`, {
        method,
        headers: { 'Content-Type': 'application/json', ...headers },
        body: payload,
      })
        .then(async (res) => {
          const json: unknown = await res.json();
          server.close();
          resolve({ status: res.status, body: json });
        })
        .catch((err) => {
          server.close();
          resolve({ status: 500, body: { error: err instanceof Error ? err.message : String(err) } });
        });
    });
  });
}

/** Walk a JSON value by property names and array indexes. */
export function at(value: unknown, ...path: Array<string | number>): unknown {
  let current = value;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

/** The error code of a typed error response. */
export function errorCode(res: TestResponse): unknown {
  return at(res.body, 'error', 'code');
}
