/**
 * Minimal HTTP capability used by the content fetcher.
 * Swapped for a fake in tests so no request leaves the process.
 */

export interface HttpResponse {
  status: number;
  body: string;
}

export interface HttpClient {
  get(url: string, headers: Record<string, string>): Promise<HttpResponse>;
}

export const fetchHttpClient: HttpClient = {
  async get(url, headers) {
    const response = await fetch(url, { method: "GET", headers });
    return {
      status: response.status,
      body: await response.text(),
    };
  },
};
