import { setTimeout as delay } from "timers/promises";
import { fetch, type Dispatcher, type Headers, type Response } from "undici";
import { HttpError } from "./errors.js";
import { logger } from "./logger.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type HttpOpts = {
  method?: HttpMethod;
  headers?: Record<string, string>;
  body?: unknown;
  retries?: number;
  backoffBaseMs?: number;
  dispatcher?: Dispatcher;
};

export type HttpResponse<T> = {
  status: number;
  headers: Headers;
  data: T;
};

function isTransient(status: number) {
  return status === 429 || (status >= 500 && status < 600);
}

function retryAfterMs(headers: Headers): number | null {
  const raw = headers.get("retry-after");
  if (raw === null) return null;
  const seconds = Number(raw);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null;
}

export async function httpJson<T>(url: string, opts: HttpOpts = {}): Promise<HttpResponse<T>> {
  const { method = "GET", headers = {}, body, retries = 4, backoffBaseMs = 500, dispatcher } = opts;
  const init = {
    method,
    headers: body === undefined ? headers : { "Content-Type": "application/json", ...headers },
    body: body === undefined ? undefined : JSON.stringify(body),
    dispatcher,
  };

  let attempt = 0;
  while (true) {
    let wait: number | null = null;
    let res: Response | null = null;
    try {
      res = await fetch(url, init);
    } catch (err) {
      if (attempt >= retries) {
        logger.error({ url, method, err: String(err) }, "HTTP failed");
        throw err;
      }
    }
    if (res) {
      const txt = await res.text();
      if (res.status >= 200 && res.status < 300) {
        return { status: res.status, headers: res.headers, data: (txt ? JSON.parse(txt) : null) as T };
      }
      // Non-retryable
      if (!isTransient(res.status)) throw new HttpError(res.status, url, txt);
      if (attempt >= retries) {
        logger.error({ url, method, status: res.status }, "HTTP failed");
        throw new HttpError(res.status, url, txt);
      }
      wait = retryAfterMs(res.headers);
    }
    attempt++;
    const backoff = wait ?? backoffBaseMs * Math.pow(2, attempt - 1) + Math.random() * Math.min(250, backoffBaseMs);
    logger.warn({ url, method, attempt, wait: Math.round(backoff) }, "HTTP retry");
    await delay(backoff);
  }
}
