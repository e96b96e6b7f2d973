import { Era } from "./era";
import { ScheduleDecodeError } from "./errors";
import type { ScheduleEntry, TimeSlot, Weekday } from "./types";

export const WEEKDAYS: readonly Weekday[] = ["一", "二", "三", "四", "五", "六", "日"];

// Period order of the listing. "@" is the tenth period, spelled "10" in newer pages.
export const TIME_SLOTS: readonly TimeSlot[] = [
  "0", "1", "2", "3", "4", "5", "6", "7", "8", "9", "@", "A", "B", "C", "D",
];

export const TENTH_SLOT: TimeSlot = "@";
export const ARRANGED_SLOT: TimeSlot = "*";

// Placeholder classroom meaning "ask the department office".
export const SEE_DEPARTMENT_OFFICE = "請洽系所辦";

// e.g. "第1,2,3週" or "第 1 週": which calendar weeks the entry runs
const WEEK_RANGE_PREFIX = /^\s*第[\d\s,]+週/;

type DecoderState = "stray" | "day" | "time" | "classroom";

function isWeekday(ch: string): ch is Weekday {
  return WEEKDAYS.some((day) => day === ch);
}

function isOrderedSlot(ch: string): ch is TimeSlot {
  return TIME_SLOTS.some((slot) => slot === ch);
}

function slotPosition(slot: TimeSlot | undefined): number {
  return slot === undefined ? -1 : TIME_SLOTS.indexOf(slot);
}

function isSpace(ch: string): boolean {
  return /\s/.test(ch);
}

/**
 * Decodes the visible text of a schedule cell into (day, slots, classroom)
 * entries, e.g. `一1234(普201)` or `二1-4(普101)三5@(普102)`.
 *
 * The legacy grammar ignores commas, expands `-` ranges over the period
 * order and accepts `*`; the modern grammar is strictly comma separated.
 * Text in parentheses before the first weekday is kept aside and only
 * replaces the classrooms when every one of them is {@link SEE_DEPARTMENT_OFFICE}.
 *
 * A decoder instance holds the state of one decode and is not reusable.
 */
export class ScheduleDecoder {
  private readonly text: string;
  private readonly offset: number;

  private state: DecoderState = "stray";
  private pos = 0;
  private depth = 0;
  private stray = "";

  private day: Weekday | "" = "";
  private slots: TimeSlot[] = [];
  private token = "";
  private rangePending = false;
  private classroom = "";

  private readonly entries: ScheduleEntry[] = [];

  constructor(
    private readonly source: string,
    private readonly era: Era
  ) {
    const prefix = source.match(WEEK_RANGE_PREFIX);
    this.offset = prefix ? prefix[0].length : 0;
    this.text = source.slice(this.offset);
  }

  decode(): ScheduleEntry[] {
    for (this.pos = 0; this.pos < this.text.length; this.pos++) {
      const ch = this.text[this.pos];
      if (isSpace(ch)) continue;
      this.step(ch);
    }

    if (this.state === "classroom" && this.depth > 0 && this.classroom.endsWith(")")) {
      // unbalanced "(...(...)": keep what we have
      this.pushEntry();
      return this.entries;
    }

    if (this.isBlank() && this.stray !== "" && this.entries.length === 0) {
      return [{ day: "", timeSlots: [], classroom: this.stray }];
    }

    if (!this.isBlank() || this.depth !== 0 || this.token !== "" || this.rangePending) {
      throw this.fail("incomplete schedule entry", this.text.length);
    }

    if (
      this.stray !== "" &&
      this.entries.length > 0 &&
      this.entries.every((e) => e.classroom === SEE_DEPARTMENT_OFFICE)
    ) {
      return this.entries.map((entry) => ({ ...entry, classroom: this.stray }));
    }
    return this.entries;
  }

  private step(ch: string): void {
    switch (this.state) {
      case "stray":
        return this.stepStray(ch);
      case "day":
        return this.stepDay(ch);
      case "time":
        return this.era === Era.Modern ? this.stepModernTime(ch) : this.stepLegacyTime(ch);
      case "classroom":
        return this.stepClassroom(ch);
    }
  }

  private stepStray(ch: string): void {
    if (this.depth === 0) {
      if (ch === "(") {
        this.depth = 1;
        return;
      }
      this.state = "day";
      return this.stepDay(ch);
    }
    if (ch === "(") this.depth++;
    if (ch === ")") this.depth--;
    if (this.depth > 0) this.stray += ch;
  }

  private stepDay(ch: string): void {
    if (!isWeekday(ch)) throw this.fail(`expected a weekday, got ${JSON.stringify(ch)}`);
    this.day = ch;
    this.state = "time";
  }

  private stepModernTime(ch: string): void {
    if (ch === ",") {
      this.flushToken();
      return;
    }
    if (ch === "(") {
      this.flushToken();
      this.openClassroom();
      return;
    }
    if (!isOrderedSlot(ch)) {
      throw this.fail(`unexpected character ${JSON.stringify(ch)} in time slots`);
    }
    this.token += ch;
  }

  private flushToken(): void {
    const token = this.token;
    this.token = "";
    if (token === "") return;
    if (token === "10") {
      this.slots.push(TENTH_SLOT);
    } else if (isOrderedSlot(token)) {
      this.slots.push(token);
    } else {
      throw this.fail(`invalid time slot ${JSON.stringify(token)}`);
    }
  }

  private stepLegacyTime(ch: string): void {
    if (ch === ",") return;
    if (ch === "(") {
      if (this.rangePending) throw this.fail("range without an end");
      this.openClassroom();
      return;
    }
    if (ch === "-") {
      if (slotPosition(this.slots[this.slots.length - 1]) < 0) {
        throw this.fail("range without a start");
      }
      this.rangePending = true;
      return;
    }
    if (ch === ARRANGED_SLOT) {
      if (this.rangePending) throw this.fail("range ending in an arranged slot");
      this.slots.push(ARRANGED_SLOT);
      return;
    }
    if (!isOrderedSlot(ch)) {
      throw this.fail(`unexpected character ${JSON.stringify(ch)} in time slots`);
    }

    const previous = this.lastOrderedSlot();
    let slot: TimeSlot = ch;
    if (ch === "1") {
      const next = this.peek();
      if (next !== undefined && this.text[next] === "0") {
        // "10" is the tenth period only while the list is still ascending
        if (slotPosition(previous) >= slotPosition(TENTH_SLOT)) {
          throw this.fail("ambiguous multi-character time slot \"10\"");
        }
        slot = TENTH_SLOT;
        this.pos = next;
      }
    }

    if (!this.rangePending) {
      this.slots.push(slot);
      return;
    }
    const from = slotPosition(previous);
    const to = slotPosition(slot);
    if (to <= from) throw this.fail(`descending range ending in ${JSON.stringify(slot)}`);
    this.slots.push(...TIME_SLOTS.slice(from + 1, to + 1));
    this.rangePending = false;
  }

  private stepClassroom(ch: string): void {
    if (ch === "(") {
      this.depth++;
    } else if (ch === ")") {
      this.depth--;
      if (this.depth === 0) {
        this.pushEntry();
        this.state = "day";
        return;
      }
    }
    this.classroom += ch;
  }

  private openClassroom(): void {
    this.state = "classroom";
    this.depth = 1;
  }

  private pushEntry(): void {
    this.entries.push({ day: this.day, timeSlots: this.slots, classroom: this.classroom });
    this.day = "";
    this.slots = [];
    this.classroom = "";
  }

  private isBlank(): boolean {
    return this.day === "" && this.slots.length === 0 && this.classroom === "";
  }

  private lastOrderedSlot(): TimeSlot | undefined {
    for (let i = this.slots.length - 1; i >= 0; i--) {
      if (this.slots[i] !== ARRANGED_SLOT) return this.slots[i];
    }
    return undefined;
  }

  // index of the next non-space character
  private peek(): number | undefined {
    for (let i = this.pos + 1; i < this.text.length; i++) {
      if (!isSpace(this.text[i])) return i;
    }
    return undefined;
  }

  private fail(detail: string, at: number = this.pos): ScheduleDecodeError {
    return new ScheduleDecodeError(this.source, at + this.offset, detail);
  }
}

export function decodeSchedule(text: string, era: Era): ScheduleEntry[] {
  return new ScheduleDecoder(text, era).decode();
}
