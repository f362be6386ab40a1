import type { NumericRange } from "../types";

export class DataLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DataLoadError";
  }
}

export class InvalidRangeError extends Error {
  constructor(message: string, readonly range?: NumericRange) {
    super(message);
    this.name = "InvalidRangeError";
  }
}
