export type TripLoadErrorCode =
  | "NO_MATCH"
  | "UNREADABLE"
  | "UNDECODABLE"
  | "MALFORMED_CSV"
  | "MISSING_COLUMNS"
  | "HEADER_MISMATCH";

// Source couldn't be loaded at all; nothing downstream runs
export class TripLoadError extends Error {
  constructor(
    message: string,
    public readonly code: TripLoadErrorCode,
    public readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TripLoadError";
  }
}

// Output couldn't be written; the target path is left untouched
export class TripWriteError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TripWriteError";
  }
}

export type GeocodeErrorCode = "PROVIDER_ERROR" | "NETWORK_ERROR" | "INVALID_RESPONSE";

export class GeocodeError extends Error {
  constructor(
    message: string,
    public readonly code: GeocodeErrorCode,
    public readonly query: string
  ) {
    super(message);
    this.name = "GeocodeError";
  }
}
