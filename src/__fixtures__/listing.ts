import { COLUMN_FIELDS, layoutWidth, policyFor } from "../era";
import type { ColumnLayout, Era } from "../era";
import type { ListingQuery, RedirectProbe, Transport } from "../types";
import { encodeBig5 } from "../utils";

export type RowValues = Partial<Record<keyof ColumnLayout, string>>;

/** A result row with `values` (inner HTML) at the era's columns, `&nbsp;` elsewhere. */
export function buildRow(era: Era, values: RowValues, extraCell = "&nbsp;"): string {
  const { columns } = policyFor(era);
  const cells: string[] = new Array<string>(layoutWidth(columns)).fill("&nbsp;");
  for (const field of COLUMN_FIELDS) {
    const value = values[field];
    if (value !== undefined) cells[columns[field]] = value;
  }
  cells[2] = extraCell;
  return `<tr>${cells.map((c) => `<td>${c}</td>`).join("")}</tr>`;
}

export function listingPage(rows: string[]): string {
  const filler = "<table><tr><td>x</td></tr></table>";
  return [
    "<html><head><meta charset=\"big5\"></head><body>",
    filler,
    filler,
    filler,
    "<table><tr><th>流水號</th><th>授課對象</th></tr>",
    ...rows,
    "</table></body></html>",
  ].join("");
}

export function semesterPage(semesters: string[], selected: string, count: number): string {
  const options = semesters
    .map((s) => `<option value="${s}"${s === selected ? " selected" : ""}>${s}</option>`)
    .join("");
  return `<html><body><form><select id="select_sem" name="current_sem">${options}</select><span><b>${count}</b> 筆</span></form></body></html>`;
}

export class FakeTransport implements Transport {
  readonly listingCalls: ListingQuery[] = [];
  readonly probeCalls: string[] = [];

  constructor(
    private readonly pages: (query: ListingQuery) => string,
    private readonly probes: (url: string) => RedirectProbe = () => ({ status: 404, location: null })
  ) {}

  async fetchListing(query: ListingQuery): Promise<Buffer> {
    this.listingCalls.push(query);
    return encodeBig5(this.pages(query));
  }

  async probeRedirect(url: string): Promise<RedirectProbe> {
    this.probeCalls.push(url);
    return this.probes(url);
  }
}
