export type Weekday = "一" | "二" | "三" | "四" | "五" | "六" | "日";

// "@" is the tenth slot, written "10" in the listing; "*" is arranged time
export type TimeSlot =
  | "0" | "1" | "2" | "3" | "4" | "5" | "6" | "7" | "8" | "9"
  | "@" | "A" | "B" | "C" | "D"
  | "*";

export interface ScheduleEntry {
  readonly day: Weekday | ""; // empty only when the cell held nothing but stray text
  readonly timeSlots: readonly TimeSlot[];
  readonly classroom: string;
}

export type ChangeStatus = "停開" | "加開" | "異動" | "";

export interface CourseRecord {
  kind: "course";
  serNo: string; // 流水號
  department: string;
  dptCode: string | null;
  couCode: string;
  klass: string;
  couCname: string;
  credit: number; // integer before the modern era, fractional from it
  coSelect: number;
  teaCname: string;
  teaCode: string | null;
  selCode: string;
  scheduleText: string;
  schedule: readonly ScheduleEntry[];
  gmark: string; // raw markup
  comment: string; // raw markup
  coChg: ChangeStatus;
  ceibaId: string | null;
}

export interface NotFoundRecord {
  kind: "notFound";
}

export type PageEntry = CourseRecord | NotFoundRecord;

export type Page = PageEntry[];

export interface ListingQuery {
  semester?: string; // current_sem
  startrec?: number;
}

export interface RedirectProbe {
  status: number;
  location: string | null;
}

export interface Transport {
  fetchListing(query: ListingQuery): Promise<Buffer>;
  probeRedirect(url: string): Promise<RedirectProbe>;
}

export interface CrawlerConfig {
  listingUrl: string;
  cacheSize: number;
  pageSize: number;
  maxRetries: number;
  requestTimeoutMs: number;
  tls: {
    ciphers?: string;
    minVersion?: TlsVersion;
    maxVersion?: TlsVersion;
  };
}

export type TlsVersion = "TLSv1" | "TLSv1.1" | "TLSv1.2" | "TLSv1.3";
