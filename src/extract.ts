import { layoutWidth, policyFor } from "./era";
import type { Era, EraPolicy } from "./era";
import { ExtractionError, TransportError } from "./errors";
import { decodeSchedule } from "./schedule";
import type { ChangeStatus, CourseRecord, ScheduleEntry, Transport } from "./types";
import { parseFloatCell, parseIntCell, queryParam, stripPlaceholder } from "./utils";

export interface CellLink {
  href: string;
  text: string;
}

export interface CellHandle {
  text(): string;
  /** The cell's leading anchor, if its first child is one. */
  link(): CellLink | null;
  markup(): string;
}

export interface RowHandle {
  cells(): CellHandle[];
  /** `src` of every image inside the row, in document order. */
  images(): string[];
}

const MARKER_PREFIX = "images/";

export const CHANGE_MARKERS: ReadonlyMap<string, Exclude<ChangeStatus, "">> = new Map<string, Exclude<ChangeStatus, "">>([
  ["images/cancel.gif", "停開"],
  ["images/add.gif", "加開"],
  ["images/chg.gif", "異動"],
]);

export const NEUTRAL_MARKERS: readonly string[] = ["images/blank.gif"];

export const REDIRECT_STATUSES: readonly number[] = [301, 302, 303, 307, 308];

// Statuses the course platform answers with when a course has no site.
const NO_SITE_STATUSES: readonly number[] = [200, 404];

const CEIBA_LOGIN = "https://ceiba.ntu.edu.tw/login_test.php";
const CEIBA_COURSE = "https://ceiba.ntu.edu.tw/course/";

export function ceibaIdFromLocation(location: string): string | null {
  let id: string | null = null;
  if (location.startsWith(CEIBA_LOGIN)) {
    id = queryParam(location, "csn");
  } else if (location.startsWith(CEIBA_COURSE)) {
    id = location.split("/")[4] ?? null;
  }
  return id !== null && /^\d+$/.test(id) ? id : null;
}

export class RecordExtractor {
  private readonly policy: EraPolicy;
  private readonly width: number;

  constructor(
    readonly era: Era,
    private readonly transport: Pick<Transport, "probeRedirect">
  ) {
    this.policy = policyFor(era);
    this.width = layoutWidth(this.policy.columns);
  }

  async extract(row: RowHandle): Promise<CourseRecord> {
    const cells = row.cells();
    const { columns } = this.policy;
    const serNo = cells.length > 0 ? stripPlaceholder(cells[columns.serNo].text()) : "";
    if (cells.length < this.width) {
      throw new ExtractionError(serNo, `expected ${this.width} cells, got ${cells.length}`);
    }

    const nameCell = cells[columns.couCname];
    const teacherCell = cells[columns.teaCname];
    const scheduleText = stripPlaceholder(cells[columns.schedule].text());

    const record: CourseRecord = {
      kind: "course",
      serNo,
      department: stripPlaceholder(cells[columns.department].text()),
      dptCode: this.linkParam(nameCell, "dpt_code", serNo),
      couCode: stripPlaceholder(cells[columns.couCode].text()),
      klass: stripPlaceholder(cells[columns.klass].text()),
      couCname: linkText(nameCell),
      credit: this.numberCell(cells[columns.credit], "credit", serNo, this.policy.fractionalCredit),
      coSelect: this.numberCell(cells[columns.coSelect], "coSelect", serNo, false),
      teaCname: linkText(teacherCell),
      teaCode: this.linkParam(teacherCell, "td", serNo),
      selCode: stripPlaceholder(cells[columns.selCode].text()),
      scheduleText,
      schedule: freezeSchedule(decodeSchedule(scheduleText, this.era)),
      gmark: cells[columns.gmark].markup(),
      comment: cells[columns.comment].markup(),
      coChg: changeStatus(row.images(), serNo),
      ceibaId: await this.resolveCeiba(cells[columns.ceiba].link(), serNo),
    };
    return Object.freeze(record);
  }

  private numberCell(cell: CellHandle, field: string, serNo: string, fractional: boolean): number {
    const text = cell.text();
    const { emptyInt } = this.policy;
    const value = fractional ? parseFloatCell(text, emptyInt) : parseIntCell(text, emptyInt);
    if (value === null) {
      throw new ExtractionError(serNo, `${field} ${JSON.stringify(stripPlaceholder(text))} is not a number`);
    }
    return value;
  }

  private linkParam(cell: CellHandle, key: string, serNo: string): string | null {
    const link = cell.link();
    if (!link) return null;
    const value = queryParam(link.href, key);
    if (!value) {
      throw new ExtractionError(serNo, `link ${link.href} has no ${key}`);
    }
    return value;
  }

  private async resolveCeiba(link: CellLink | null, serNo: string): Promise<string | null> {
    if (!link) return null;
    const url = link.href.startsWith("http://") ? `https://${link.href.slice("http://".length)}` : link.href;
    const { status, location } = await this.transport.probeRedirect(url);
    if (NO_SITE_STATUSES.includes(status)) return null;
    if (!REDIRECT_STATUSES.includes(status)) {
      throw new TransportError(status, url, "a redirect");
    }
    if (location === null) {
      throw new ExtractionError(serNo, `redirect from ${url} has no Location`);
    }
    const id = ceibaIdFromLocation(location);
    if (id === null) {
      throw new ExtractionError(serNo, `unexpected course platform URL ${location}`);
    }
    return id;
  }
}

// Records are shared through the page cache
function freezeSchedule(entries: ScheduleEntry[]): readonly ScheduleEntry[] {
  return Object.freeze(entries.map((entry) => Object.freeze({ ...entry, timeSlots: Object.freeze([...entry.timeSlots]) })));
}

function linkText(cell: CellHandle): string {
  const link = cell.link();
  return stripPlaceholder(link ? link.text : cell.text());
}

export function changeStatus(images: string[], serNo: string): ChangeStatus {
  let status: ChangeStatus = "";
  for (const src of images) {
    if (!src.startsWith(MARKER_PREFIX) || NEUTRAL_MARKERS.includes(src)) continue;
    const marker = CHANGE_MARKERS.get(src);
    if (marker === undefined) {
      throw new ExtractionError(serNo, `unknown marker image ${src}`);
    }
    if (status !== "" && status !== marker) {
      throw new ExtractionError(serNo, `conflicting marker images (${status}, ${marker})`);
    }
    status = marker;
  }
  return status;
}
