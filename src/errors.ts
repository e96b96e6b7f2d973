export class CrawlerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CrawlerError";
  }
}

export class TransportError extends CrawlerError {
  constructor(
    public readonly status: number,
    public readonly url: string,
    expected: string = "200"
  ) {
    super(`HTTP status ${status} (not ${expected}) ${url}`);
    this.name = "TransportError";
  }
}

export class ListingShapeError extends CrawlerError {
  constructor(message: string) {
    super(message);
    this.name = "ListingShapeError";
  }
}

export class ExtractionError extends CrawlerError {
  constructor(
    public readonly serNo: string,
    detail: string
  ) {
    super(`Row ${serNo || "(no serial)"}: ${detail}`);
    this.name = "ExtractionError";
  }
}

export class ScheduleDecodeError extends CrawlerError {
  constructor(
    public readonly source: string,
    public readonly position: number,
    detail: string
  ) {
    super(`${detail} at ${position} in schedule ${JSON.stringify(source)}`);
    this.name = "ScheduleDecodeError";
  }
}

export class SemesterFormatError extends CrawlerError {
  constructor(public readonly semester: string) {
    super(`Invalid semester ${JSON.stringify(semester)} (expected <year>-<term>, e.g. 103-1)`);
    this.name = "SemesterFormatError";
  }
}
