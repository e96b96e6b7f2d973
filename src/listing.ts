import { load as loadCheerio } from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import { ListingShapeError } from "./errors";
import type { CellHandle, CellLink, RowHandle } from "./extract";
import type { Transport } from "./types";
import { decodeBig5, stripPlaceholder } from "./utils";

// The results are the fourth top-level table; its first row is the header.
export const RESULT_TABLE_INDEX = 3;

export function parseListing(body: Buffer): CheerioAPI {
  return loadCheerio(decodeBig5(body));
}

class CheerioCell implements CellHandle {
  constructor(
    private readonly $: CheerioAPI,
    private readonly cell: Cheerio<Element>
  ) {}

  text(): string {
    return this.cell.text();
  }

  link(): CellLink | null {
    const first = this.cell.children().first();
    if (first.length === 0 || !first.is("a")) return null;
    const href = first.attr("href");
    if (href === undefined) return null;
    return { href, text: first.text() };
  }

  markup(): string {
    return this.$.html(this.cell);
  }
}

export class CheerioRow implements RowHandle {
  constructor(
    private readonly $: CheerioAPI,
    private readonly row: Cheerio<Element>
  ) {}

  cells(): CellHandle[] {
    return this.row
      .children("td")
      .toArray()
      .map((td) => new CheerioCell(this.$, this.$(td)));
  }

  images(): string[] {
    return this.row
      .find("img")
      .toArray()
      .map((img) => this.$(img).attr("src") ?? "");
  }
}

export function listingRows($: CheerioAPI): CheerioRow[] {
  const table = $("body > table").eq(RESULT_TABLE_INDEX);
  if (table.length === 0) {
    throw new ListingShapeError("Listing page has no result table");
  }
  const tbody = table.children("tbody");
  const rows = (tbody.length > 0 ? tbody : table).children("tr");
  return rows
    .slice(1)
    .toArray()
    .map((tr) => new CheerioRow($, $(tr)));
}

function semesterBox($: CheerioAPI): Cheerio<Element> {
  const box = $("select#select_sem");
  if (box.length === 0) {
    throw new ListingShapeError("Listing page has no semester select box");
  }
  return box.first();
}

export async function listSemesters(transport: Transport): Promise<string[]> {
  const $ = parseListing(await transport.fetchListing({}));
  return semesterBox($)
    .children("option")
    .toArray()
    .map((opt) => $(opt).attr("value") ?? "")
    .filter(Boolean);
}

export async function getDefaultSemester(transport: Transport): Promise<string> {
  const $ = parseListing(await transport.fetchListing({}));
  const value = semesterBox($).children("option[selected]").first().attr("value");
  if (!value) {
    throw new ListingShapeError("Semester select box has no selected option");
  }
  return value;
}

// The count sits in the first child of the element right after the select box.
export async function getCourseCount(transport: Transport, semester: string): Promise<number> {
  const $ = parseListing(await transport.fetchListing({ semester }));
  const text = stripPlaceholder(semesterBox($).next().children().first().text());
  const count = parseInt(text, 10);
  if (!Number.isFinite(count)) {
    throw new ListingShapeError(`Unreadable course count ${JSON.stringify(text)}`);
  }
  return count;
}
