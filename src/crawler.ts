import { PagedCache } from "./cache";
import { resolveEra } from "./era";
import type { Era } from "./era";
import { RecordExtractor } from "./extract";
import { listingRows, parseListing } from "./listing";
import type { NotFoundRecord, Page, PageEntry, Transport } from "./types";

export const DEFAULT_PAGE_SIZE = 15;
export const DEFAULT_CACHE_SIZE = 5;

export const NOT_FOUND: NotFoundRecord = Object.freeze({ kind: "notFound" });

export interface CrawlerOptions {
  semester: string;
  transport: Transport;
  cacheSize?: number;
  pageSize?: number;
}

/**
 * Reads records of one semester by global index. Each listing page is
 * fetched once and kept in a direct-mapped cache until it collides with
 * another page or is invalidated.
 */
export class Crawler {
  readonly semester: string;
  readonly era: Era;
  readonly pageSize: number;

  private readonly transport: Transport;
  private readonly cache: PagedCache<Page>;
  private readonly extractor: RecordExtractor;

  constructor(options: CrawlerOptions) {
    const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new RangeError(`Page size must be a positive integer, got ${pageSize}`);
    }
    this.semester = options.semester;
    this.era = resolveEra(options.semester);
    this.pageSize = pageSize;
    this.transport = options.transport;
    this.cache = new PagedCache<Page>(options.cacheSize ?? DEFAULT_CACHE_SIZE);
    this.extractor = new RecordExtractor(this.era, this.transport);
  }

  static pageAddress(index: number, pageSize: number): number {
    return Math.floor(index / pageSize);
  }

  async getRecord(index: number): Promise<PageEntry | undefined> {
    if (!Number.isInteger(index) || index < 0) return undefined;
    const page = await this.cache.load(Crawler.pageAddress(index, this.pageSize), this.loadPage);
    return page[index % this.pageSize];
  }

  invalidateRecord(index: number): void {
    if (!Number.isInteger(index) || index < 0) return;
    this.cache.invalidate(Crawler.pageAddress(index, this.pageSize));
  }

  invalidateAll(): void {
    this.cache.resetAll();
  }

  private loadPage = async (address: number): Promise<Page> => {
    const body = await this.transport.fetchListing({
      semester: this.semester,
      startrec: address * this.pageSize,
    });
    const rows = listingRows(parseListing(body)).slice(0, this.pageSize);

    // one row at a time: the transport is not safe for concurrent use
    const page: PageEntry[] = [];
    for (const row of rows) {
      page.push(await this.extractor.extract(row));
    }
    while (page.length < this.pageSize) page.push(NOT_FOUND);
    return page;
  };
}
