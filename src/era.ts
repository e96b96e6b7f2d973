import { SemesterFormatError } from "./errors";

export enum Era {
  Legacy = "legacy",
  Modern = "modern",
}

export interface Semester {
  year: number; // academic year of the ROC calendar, e.g. 103
  term: number;
}

// Semesters from 100-1 onwards use the modern column layout, fractional
// credits and the comma-delimited time-slot grammar.
export const MODERN_ERA_START: Semester = { year: 100, term: 1 };

export function parseSemester(id: string): Semester {
  const m = id.trim().match(/^(\d{2,3})-(\d)$/);
  if (!m) throw new SemesterFormatError(id);
  return { year: parseInt(m[1], 10), term: parseInt(m[2], 10) };
}

export function compareSemesters(a: Semester, b: Semester): number {
  return a.year - b.year || a.term - b.term;
}

export function resolveEra(semesterId: string): Era {
  const semester = parseSemester(semesterId);
  return compareSemesters(semester, MODERN_ERA_START) >= 0 ? Era.Modern : Era.Legacy;
}

export interface ColumnLayout {
  serNo: number;
  department: number;
  couCode: number;
  klass: number;
  couCname: number;
  credit: number;
  selCode: number;
  teaCname: number;
  coSelect: number;
  schedule: number;
  gmark: number;
  comment: number;
  ceiba: number;
}

export const COLUMN_FIELDS: readonly (keyof ColumnLayout)[] = [
  "serNo",
  "department",
  "couCode",
  "klass",
  "couCname",
  "credit",
  "selCode",
  "teaCname",
  "coSelect",
  "schedule",
  "gmark",
  "comment",
  "ceiba",
];

export function layoutWidth(columns: ColumnLayout): number {
  return Math.max(...COLUMN_FIELDS.map((field) => columns[field])) + 1;
}

export interface EraPolicy {
  era: Era;
  columns: ColumnLayout;
  emptyInt: number;
  fractionalCredit: boolean;
}

const POLICIES: Record<Era, EraPolicy> = {
  [Era.Legacy]: {
    era: Era.Legacy,
    columns: {
      serNo: 0,
      department: 1,
      klass: 3,
      couCname: 4,
      credit: 5,
      couCode: 6,
      selCode: 8,
      teaCname: 9,
      coSelect: 10,
      schedule: 11,
      gmark: 13,
      comment: 14,
      ceiba: 15,
    },
    emptyInt: -1,
    fractionalCredit: false,
  },
  [Era.Modern]: {
    era: Era.Modern,
    columns: {
      serNo: 0,
      department: 1,
      couCode: 3,
      klass: 4,
      couCname: 5,
      credit: 6,
      teaCname: 10,
      selCode: 11,
      schedule: 12,
      coSelect: 13,
      gmark: 14,
      comment: 15,
      ceiba: 16,
    },
    emptyInt: 0,
    fractionalCredit: true,
  },
};

export function policyFor(era: Era): EraPolicy {
  return POLICIES[era];
}
