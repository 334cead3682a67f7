// packages/enricher/src/client.ts
import { z } from "zod";
import { CFG } from "./config";
import { classify, labelFromCategories } from "./categories";
import { TransportError, errorMessage } from "./errors";
import { createTechRecord } from "./record";
import { Throttle, systemClock, type Clock } from "./utils/throttle";
import type { TechField, TechLookup, TechRecord } from "./types";

// Payload de https://whatcms.org/API/Tech (code/msg también aceptados en la raíz)
// valores raros no descartan la entrada: acaba en "other"
const TechEntrySchema = z
  .object({
    name: z.union([z.string(), z.number()]).nullish().catch(null),
    version: z.union([z.string(), z.number()]).nullish().catch(null),
    category: z.string().nullish().catch(null),
    categories: z
      .array(z.unknown())
      .transform((list) => list.filter((c): c is string => typeof c === "string"))
      .nullish()
      .catch(null),
  })
  .passthrough();

const TechResponseSchema = z
  .object({
    request: z.string().nullish(),
    result: z
      .object({
        code: z.union([z.number(), z.string()]).nullish(),
        msg: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
    code: z.union([z.number(), z.string()]).nullish(),
    msg: z.string().nullish(),
    results: z.array(z.unknown()).nullish(),
  })
  .passthrough();

export type TechEntry = z.infer<typeof TechEntrySchema>;
export type TechResponse = z.infer<typeof TechResponseSchema>;

export type WhatCmsClientOpts = {
  apiKey: string;
  delayMs?: number;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  clock?: Clock;
  verbose?: boolean;
};

export const statusError = (reason: string) => `Error: ${reason}`;

export function entryLabel(entry: TechEntry): string | null {
  if (typeof entry.category === "string") return entry.category;
  if (entry.categories?.length) return labelFromCategories(entry.categories);
  return null;
}

export function entryText(entry: TechEntry): string | null {
  const name = entry.name == null ? "" : String(entry.name).trim();
  if (!name) return null;
  const version = entry.version == null ? "" : String(entry.version).trim();
  return version ? `${name} ${version}` : name;
}

export function formatStatus(body: TechResponse): string {
  const code = body.result?.code ?? body.code;
  const msg = body.result?.msg ?? body.msg;
  if (code == null || code === "") {
    return msg ? statusError(msg) : statusError("response missing result code");
  }
  return msg ? `${code} - ${msg}` : String(code);
}

/** Walks `results` once; keeps response order and drops adjacent repeats. */
export function groupEntries(results: readonly unknown[]): Record<TechField, string[]> {
  const out: Record<TechField, string[]> = {
    blogCms: [],
    ecommerceCms: [],
    programmingLanguage: [],
    database: [],
    cdn: [],
    webServer: [],
    landingPageBuilderCms: [],
    operatingSystem: [],
    webFramework: [],
    other: [],
  };
  for (const raw of results) {
    const parsed = TechEntrySchema.safeParse(raw);
    if (!parsed.success) continue;
    const text = entryText(parsed.data);
    if (!text) continue;
    const list = out[classify(entryLabel(parsed.data))];
    if (list[list.length - 1] !== text) list.push(text);
  }
  return out;
}

export class WhatCmsClient implements TechLookup {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly verbose: boolean;
  private readonly throttle: Throttle;

  constructor(opts: WhatCmsClientOpts) {
    this.apiKey = opts.apiKey;
    this.baseUrl = opts.baseUrl ?? CFG.WHATCMS_BASE_URL;
    this.timeoutMs = opts.timeoutMs ?? CFG.WHATCMS_TIMEOUT_MS;
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
    this.verbose = opts.verbose ?? CFG.VERBOSE;
    this.throttle = new Throttle(opts.delayMs ?? CFG.WHATCMS_DELAY_MS, opts.clock ?? systemClock);
  }

  get delayMs() {
    return this.throttle.delayMs;
  }

  requestUrl(url: string): string {
    const u = new URL(this.baseUrl);
    u.searchParams.set("key", this.apiKey);
    u.searchParams.set("url", url);
    return u.toString();
  }

  async fetch(url: string): Promise<TechRecord> {
    if (!url.trim()) {
      return createTechRecord(url, { responseStatus: statusError("missing url") });
    }

    const link = this.requestUrl(url);
    const waited = await this.throttle.wait();
    if (this.verbose) console.log(`[whatcms] GET ${url} (waited ${waited}ms)`);

    let res: Response;
    try {
      res = await this.request(link);
    } catch (e) {
      if (this.verbose) console.error(`[whatcms] ${url}: ${errorMessage(e)}`);
      return createTechRecord(url, { responseStatus: statusError(errorMessage(e)) });
    }

    if (!res.ok) {
      return createTechRecord(url, {
        detailLink: link,
        responseStatus: statusError(`HTTP ${res.status}`),
      });
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch {
      return createTechRecord(url, {
        detailLink: link,
        responseStatus: statusError("invalid JSON response"),
      });
    }

    const parsed = TechResponseSchema.safeParse(json);
    if (!parsed.success) {
      return createTechRecord(url, {
        detailLink: link,
        responseStatus: statusError("unexpected response shape"),
      });
    }

    const body = parsed.data;
    return createTechRecord(url, {
      detailLink: body.request || link,
      responseStatus: formatStatus(body),
      categories: groupEntries(body.results ?? []),
    });
  }

  private async request(link: string): Promise<Response> {
    try {
      return await this.fetchImpl(link, {
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (e) {
      // undici: "fetch failed" + el motivo real en cause
      const detail = e instanceof Error && e.cause instanceof Error ? `: ${e.cause.message}` : "";
      throw new TransportError(`${errorMessage(e)}${detail}`, { cause: e });
    }
  }
}
