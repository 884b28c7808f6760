/**
 * Errors that end a scouting run before any candidate can be verified.
 * Per-candidate failures never surface as exceptions; they become ERROR verdicts.
 */
export abstract class ScoutError extends Error {
  abstract readonly httpStatus: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The zone could not be determined from the user's hint or image. */
export class ResolutionError extends ScoutError {
  readonly httpStatus = 422;

  constructor(readonly reason: string) {
    super(`Zone resolution failed: ${reason}`);
  }
}

/** The places provider rejected the search or could not be reached. */
export class SearchError extends ScoutError {
  readonly httpStatus = 502;

  /**
   * @param status provider HTTP status, 0 when the request never got a response
   * @param body provider response body, or the transport error message
   */
  constructor(readonly status: number, readonly body: unknown) {
    super(`Places search failed with status ${status}`);
  }
}
