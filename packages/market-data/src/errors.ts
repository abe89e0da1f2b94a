// Upstream error taxonomy — every vendor call fails with one of these two

/** The vendor could not be reached or refused the request (network, timeout, HTTP status, rate limit, missing key). */
export class UpstreamUnavailable extends Error {
  readonly vendor: string;
  readonly status?: number;

  constructor(vendor: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(`${vendor}: ${message}`, { cause: options.cause });
    this.name = 'UpstreamUnavailable';
    this.vendor = vendor;
    this.status = options.status;
  }
}

/** The vendor answered, but not with the shape we expect. */
export class UpstreamFormatError extends Error {
  readonly vendor: string;

  constructor(vendor: string, message: string, options: { cause?: unknown } = {}) {
    super(`${vendor}: ${message}`, { cause: options.cause });
    this.name = 'UpstreamFormatError';
    this.vendor = vendor;
  }
}

export function isUpstreamError(err: unknown): err is UpstreamUnavailable | UpstreamFormatError {
  return err instanceof UpstreamUnavailable || err instanceof UpstreamFormatError;
}
