import https from "https";
import fetch from "node-fetch";
import { TransportError } from "./errors";
import type { CrawlerConfig, ListingQuery, RedirectProbe, Transport } from "./types";

const BASE_ARGS: Record<string, string> = {
  allproced: "yes",
  alltime: "yes",
  csname: "",
  cstype: "1",
};

export function buildListingUrl(baseUrl: string, query: ListingQuery): string {
  const params = new URLSearchParams(BASE_ARGS);
  if (query.semester !== undefined) params.set("current_sem", query.semester);
  if (query.startrec !== undefined) params.set("startrec", String(query.startrec));
  return `${baseUrl}?${params.toString()}`;
}

/**
 * node-fetch transport for the listing server and the course platform.
 * One instance keeps one keep-alive agent; callers must not issue
 * requests on it concurrently.
 */
export class HttpTransport implements Transport {
  private readonly agent: https.Agent;

  constructor(private readonly config: CrawlerConfig) {
    // The listing server only negotiates old protocol versions and ciphers
    this.agent = new https.Agent({
      keepAlive: true,
      ciphers: config.tls.ciphers,
      minVersion: config.tls.minVersion,
      maxVersion: config.tls.maxVersion,
    });
  }

  async fetchListing(query: ListingQuery): Promise<Buffer> {
    const url = buildListingUrl(this.config.listingUrl, query);
    const res = await fetch(url, {
      agent: this.agentFor,
      timeout: this.config.requestTimeoutMs,
    });
    if (!res.ok) throw new TransportError(res.status, url);
    return Buffer.from(await res.arrayBuffer());
  }

  async probeRedirect(url: string): Promise<RedirectProbe> {
    const res = await fetch(url, {
      agent: this.agentFor,
      redirect: "manual",
      timeout: this.config.requestTimeoutMs,
    });
    await res.arrayBuffer();
    return { status: res.status, location: res.headers.get("location") };
  }

  close(): void {
    this.agent.destroy();
  }

  private agentFor = (parsedUrl: URL): https.Agent | undefined =>
    parsedUrl.protocol === "https:" ? this.agent : undefined;
}
