export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type HttpClientOptions = {
  timeoutMs: number;
  userAgent: string;
  fetchImpl?: FetchLike;
};

export type HttpClient = {
  getJson: (url: string | URL) => Promise<unknown>;
};

export class HttpError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(url: string, status: number) {
    super(`Request failed (${status}) for ${url}`);
    this.name = "HttpError";
    this.status = status;
    this.url = url;
  }
}

export const createHttpClient = (options: HttpClientOptions): HttpClient => {
  const fetchImpl: FetchLike = options.fetchImpl ?? fetch;

  const getJson = async (url: string | URL): Promise<unknown> => {
    const target = url.toString();
    const response = await fetchImpl(target, {
      headers: {
        Accept: "application/json",
        "User-Agent": options.userAgent
      },
      signal: AbortSignal.timeout(options.timeoutMs)
    });

    if (!response.ok) {
      throw new HttpError(target, response.status);
    }

    try {
      const payload: unknown = await response.json();
      return payload;
    } catch (error) {
      throw new Error(`Malformed JSON from ${target}`, { cause: error });
    }
  };

  return { getJson };
};
