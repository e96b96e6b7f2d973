import { describe, expect, it } from "vitest";
import { buildRow, FakeTransport, listingPage } from "./__fixtures__/listing";
import type { RowValues } from "./__fixtures__/listing";
import { Era } from "./era";
import { ExtractionError, ScheduleDecodeError, TransportError } from "./errors";
import { ceibaIdFromLocation, changeStatus, RecordExtractor } from "./extract";
import type { RowHandle } from "./extract";
import { listingRows, parseListing } from "./listing";
import type { RedirectProbe } from "./types";
import { encodeBig5 } from "./utils";

const LEGACY_ROW: RowValues = {
  serNo: "12345",
  department: "中文系",
  klass: "01",
  couCname: '<a href="print_table.php?course_id=101&amp;dpt_code=1010">國文領域</a>',
  credit: "3",
  couCode: "101 10110",
  selCode: "A",
  teaCname: '<a href="teacher.php?op=s2&amp;td=101001">王小明</a>',
  coSelect: "&nbsp;",
  schedule: "一34(普201)",
  gmark: "*",
  comment: "限本系",
  ceiba: '<a href="http://ceiba.ntu.edu.tw/course_link?id=1">link</a>',
};

function rowsOf(rows: string[]): RowHandle[] {
  return listingRows(parseListing(encodeBig5(listingPage(rows))));
}

function probing(result: RedirectProbe): FakeTransport {
  return new FakeTransport(() => "", () => result);
}

async function extractOne(era: Era, values: RowValues, transport: FakeTransport, extraCell?: string) {
  const [row] = rowsOf([buildRow(era, values, extraCell)]);
  return new RecordExtractor(era, transport).extract(row);
}

describe("RecordExtractor", () => {
  it("maps a legacy row", async () => {
    const transport = probing({ status: 302, location: "https://ceiba.ntu.edu.tw/course/98765/" });
    const record = await extractOne(Era.Legacy, LEGACY_ROW, transport, '<img src="images/chg.gif">');
    expect(record).toEqual({
      kind: "course",
      serNo: "12345",
      department: "中文系",
      dptCode: "1010",
      couCode: "101 10110",
      klass: "01",
      couCname: "國文領域",
      credit: 3,
      coSelect: -1,
      teaCname: "王小明",
      teaCode: "101001",
      selCode: "A",
      scheduleText: "一34(普201)",
      schedule: [{ day: "一", timeSlots: ["3", "4"], classroom: "普201" }],
      gmark: "<td>*</td>",
      comment: "<td>限本系</td>",
      coChg: "異動",
      ceibaId: "98765",
    });
    expect(transport.probeCalls).toEqual(["https://ceiba.ntu.edu.tw/course_link?id=1"]);
    expect(Object.isFrozen(record)).toBe(true);
  });

  it("maps a modern row with fractional credits and plain cells", async () => {
    const transport = probing({ status: 500, location: null });
    const record = await extractOne(
      Era.Modern,
      {
        serNo: "54321",
        couCode: "MATH1001",
        couCname: "微積分",
        credit: "2.5",
        teaCname: "李大同",
        coSelect: "&nbsp;",
        schedule: "一1,2,10(博雅101)",
      },
      transport
    );
    expect(record.couCode).toBe("MATH1001");
    expect(record.couCname).toBe("微積分");
    expect(record.dptCode).toBeNull();
    expect(record.teaCname).toBe("李大同");
    expect(record.teaCode).toBeNull();
    expect(record.credit).toBe(2.5);
    expect(record.coSelect).toBe(0);
    expect(record.schedule).toEqual([{ day: "一", timeSlots: ["1", "2", "@"], classroom: "博雅101" }]);
    expect(record.coChg).toBe("");
    expect(record.ceibaId).toBeNull();
    expect(transport.probeCalls).toEqual([]);
  });

  it("reads credits as integers before the modern era", async () => {
    await expect(
      extractOne(Era.Legacy, { ...LEGACY_ROW, credit: "2.5", ceiba: "&nbsp;" }, probing({ status: 404, location: null }))
    ).rejects.toThrow('Row 12345: credit "2.5" is not a number');
  });

  it("fails on number cells that are not numbers", async () => {
    const transport = probing({ status: 404, location: null });
    await expect(extractOne(Era.Legacy, { ...LEGACY_ROW, credit: "三" }, transport)).rejects.toThrow(
      'Row 12345: credit "三" is not a number'
    );
    await expect(extractOne(Era.Legacy, { ...LEGACY_ROW, coSelect: "12abc" }, transport)).rejects.toThrow(
      'Row 12345: coSelect "12abc" is not a number'
    );
    expect(transport.probeCalls).toEqual([]);
  });

  it("freezes the decoded schedule", async () => {
    const record = await extractOne(Era.Legacy, LEGACY_ROW, probing({ status: 404, location: null }));
    expect(Object.isFrozen(record.schedule)).toBe(true);
    expect(Object.isFrozen(record.schedule[0])).toBe(true);
    expect(Object.isFrozen(record.schedule[0].timeSlots)).toBe(true);
  });

  it("treats 200 and 404 probes as no course site", async () => {
    for (const status of [200, 404]) {
      const record = await extractOne(Era.Legacy, LEGACY_ROW, probing({ status, location: null }));
      expect(record.ceibaId).toBeNull();
    }
  });

  it("reads the id from the login redirect", async () => {
    const transport = probing({ status: 302, location: "https://ceiba.ntu.edu.tw/login_test.php?csn=4321&lang=zh" });
    const record = await extractOne(Era.Legacy, LEGACY_ROW, transport);
    expect(record.ceibaId).toBe("4321");
  });

  it("fails on other probe statuses", async () => {
    await expect(extractOne(Era.Legacy, LEGACY_ROW, probing({ status: 500, location: null }))).rejects.toThrow(
      TransportError
    );
  });

  it("fails on unexpected redirect targets", async () => {
    await expect(
      extractOne(Era.Legacy, LEGACY_ROW, probing({ status: 302, location: "https://example.com/elsewhere" }))
    ).rejects.toThrow(ExtractionError);
    await expect(extractOne(Era.Legacy, LEGACY_ROW, probing({ status: 302, location: null }))).rejects.toThrow(
      ExtractionError
    );
  });

  it("fails on a department link without a code", async () => {
    const values = { ...LEGACY_ROW, couCname: '<a href="print_table.php?course_id=101">國文領域</a>' };
    await expect(extractOne(Era.Legacy, values, probing({ status: 404, location: null }))).rejects.toThrow(
      "Row 12345: link print_table.php?course_id=101 has no dpt_code"
    );
  });

  it("fails on short rows", async () => {
    const [row] = rowsOf(["<tr><td>777</td><td>中文系</td></tr>"]);
    const extractor = new RecordExtractor(Era.Legacy, probing({ status: 404, location: null }));
    await expect(extractor.extract(row)).rejects.toThrow("Row 777: expected 16 cells, got 2");
  });

  it("passes decode errors through", async () => {
    const values = { ...LEGACY_ROW, schedule: "月1(普101)" };
    await expect(extractOne(Era.Legacy, values, probing({ status: 404, location: null }))).rejects.toThrow(
      ScheduleDecodeError
    );
  });
});

describe("changeStatus", () => {
  it("maps each marker image", () => {
    expect(changeStatus(["images/cancel.gif"], "1")).toBe("停開");
    expect(changeStatus(["images/add.gif"], "1")).toBe("加開");
    expect(changeStatus(["images/chg.gif", "images/chg.gif"], "1")).toBe("異動");
  });

  it("is blank without a marker", () => {
    expect(changeStatus([], "1")).toBe("");
    expect(changeStatus(["images/blank.gif", "/icons/pdf.png"], "1")).toBe("");
  });

  it("rejects unknown and conflicting markers", () => {
    expect(() => changeStatus(["images/new.gif"], "1")).toThrow(ExtractionError);
    expect(() => changeStatus(["images/cancel.gif", "images/chg.gif"], "1")).toThrow(ExtractionError);
  });
});

describe("ceibaIdFromLocation", () => {
  it("accepts the two known shapes", () => {
    expect(ceibaIdFromLocation("https://ceiba.ntu.edu.tw/course/98765/")).toBe("98765");
    expect(ceibaIdFromLocation("https://ceiba.ntu.edu.tw/login_test.php?csn=4321")).toBe("4321");
  });

  it("rejects anything else", () => {
    expect(ceibaIdFromLocation("https://ceiba.ntu.edu.tw/index.php")).toBeNull();
    expect(ceibaIdFromLocation("https://ceiba.ntu.edu.tw/login_test.php")).toBeNull();
  });
});
