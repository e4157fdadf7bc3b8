/**
 * Error types shared by the link, protocol and device layers.
 *
 * Every reportable error carries a `reason`: a short kebab-case code that
 * travels back to the sender inside a diagnostic frame
 * (`ERROR:<reason>:<original>`), so it must never contain spaces, colons
 * or the frame delimiter.
 */

/** Base class for errors that are reported back over the link */
export abstract class ReportableError extends Error {
  readonly reason: string;

  constructor(reason: string, message: string) {
    super(message);
    this.reason = reason;
    this.name = 'ReportableError';
  }
}

/**
 * A message that can never be put on the wire (contains the delimiter or
 * heartbeat padding). Always a programming error on the sending side.
 */
export class FramingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FramingError';
  }
}

/** Malformed frame, unparseable parameter or a command this side does not accept */
export class ProtocolError extends ReportableError {
  constructor(reason: string, message: string) {
    super(reason, message);
    this.name = 'ProtocolError';
  }
}

/** A servo controller, GPIO board or pin could not be initialized or written */
export class ResourceError extends ReportableError {
  constructor(reason: string, message: string) {
    super(reason, message);
    this.name = 'ResourceError';
  }
}

/** A sensor, turnout or signal head named in a frame does not exist locally */
export class UnknownTargetError extends ReportableError {
  constructor(reason: string, message: string) {
    super(reason, message);
    this.name = 'UnknownTargetError';
  }
}

/** Extract a printable message from anything thrown */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
