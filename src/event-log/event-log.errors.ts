/** The configured event log could not be read or did not contain records. */
export class EventLogUnavailableError extends Error {
  constructor(
    message: string,
    readonly location: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'EventLogUnavailableError';
  }
}
