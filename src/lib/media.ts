import axios, { type AxiosRequestConfig } from "axios";
import { MediaFetchError } from "./errors.js";

const REQUEST_TIMEOUT_MS = 30_000;
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export interface MediaResponse {
  status: number;
  headers: object;
  data: unknown;
}

export interface MediaHttpClient {
  get(url: string, config: AxiosRequestConfig): Promise<MediaResponse>;
}

export interface MediaCredentials {
  username: string;
  password: string;
}

export interface FetchedMedia {
  content: Buffer;
  contentType?: string;
  url: string;
}

export type MediaFetchResult =
  | { ok: true; media: FetchedMedia }
  | { ok: false; error: MediaFetchError };

export interface MediaFetcher {
  fetch(url: string): Promise<MediaFetchResult>;
}

export const createAxiosMediaClient = (): MediaHttpClient => {
  const client = axios.create({ timeout: REQUEST_TIMEOUT_MS });
  return {
    get: (url, config) => client.get<ArrayBuffer>(url, config),
  };
};

const readHeader = (headers: object, name: string): string | undefined => {
  const value: unknown = Reflect.get(headers, name);
  return typeof value === "string" && value.length ? value : undefined;
};

const toBuffer = (data: unknown): Buffer => {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }
  if (ArrayBuffer.isView(data)) {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  }
  if (typeof data === "string") {
    return Buffer.from(data);
  }
  return Buffer.alloc(0);
};

const isSuccess = (status: number): boolean => status >= 200 && status < 300;

/**
 * GETs the media without automatic redirects. A redirect with a Location header
 * earns exactly one follow-up GET; credentials go to the first host only.
 */
export const createMediaFetcher = (
  options: { client?: MediaHttpClient; credentials?: MediaCredentials } = {}
): MediaFetcher => {
  const client = options.client ?? createAxiosMediaClient();

  const request = (url: string, credentials?: MediaCredentials) =>
    client.get(url, {
      responseType: "arraybuffer",
      maxRedirects: 0,
      validateStatus: () => true,
      auth: credentials,
    });

  return {
    fetch: async (url) => {
      try {
        let target = url;
        let response = await request(url, options.credentials);

        const location = readHeader(response.headers, "location");
        if (REDIRECT_STATUSES.has(response.status) && location) {
          target = new URL(location, url).toString();
          response = await request(target);
        }

        if (!isSuccess(response.status)) {
          return {
            ok: false,
            error: new MediaFetchError(`Media request failed with status ${response.status}`, target, {
              status: response.status,
            }),
          };
        }

        return {
          ok: true,
          media: {
            content: toBuffer(response.data),
            contentType: readHeader(response.headers, "content-type"),
            url: target,
          },
        };
      } catch (error) {
        return {
          ok: false,
          error: new MediaFetchError("Media request failed", url, { cause: error }),
        };
      }
    },
  };
};
