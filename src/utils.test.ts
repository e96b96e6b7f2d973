import { describe, expect, it } from "vitest";
import {
  decodeBig5,
  encodeBig5,
  formatProgress,
  parseFloatCell,
  parseIntCell,
  queryParam,
  stripPlaceholder,
} from "./utils";

describe("utils", () => {
  it("strips the non-breaking placeholder", () => {
    expect(stripPlaceholder("\u00A0")).toBe("");
    expect(stripPlaceholder("\u00A0中文系\u00A0")).toBe("中文系");
  });

  it("keeps placeholders inside the text", () => {
    expect(stripPlaceholder("\u00A0王\u00A0小明 \n")).toBe("王\u00A0小明");
  });

  it("maps empty number cells to the sentinel", () => {
    expect(parseIntCell("\u00A0", -1)).toBe(-1);
    expect(parseIntCell(" 3 ", -1)).toBe(3);
    expect(parseFloatCell("", 0)).toBe(0);
    expect(parseFloatCell("2.5", 0)).toBe(2.5);
  });

  it("rejects number cells with other text", () => {
    expect(parseIntCell("12abc", -1)).toBeNull();
    expect(parseIntCell("2.5", -1)).toBeNull();
    expect(parseIntCell("三", -1)).toBeNull();
    expect(parseFloatCell("2.5.1", 0)).toBeNull();
    expect(parseIntCell("-3", 0)).toBe(-3);
  });

  it("reads query parameters from relative links", () => {
    expect(queryParam("print_table.php?course_id=101&dpt_code=1010", "dpt_code")).toBe("1010");
    expect(queryParam("print_table.php", "dpt_code")).toBeNull();
  });

  it("decodes Big5 bodies", () => {
    expect(decodeBig5(encodeBig5("國文領域"))).toBe("國文領域");
  });

  it("draws the progress bar", () => {
    expect(formatProgress(15, 30)).toBe(`(   15/   30) [${"#".repeat(25)}${" ".repeat(25)}]  50.00%`);
    expect(formatProgress(30, 30)).toBe(`(   30/   30) [${"#".repeat(50)}] 100.00%`);
  });
});
