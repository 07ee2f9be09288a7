/**
 * Base class of every error raised by this library. Callers can catch
 * MideaError to handle all of them, or a subclass for a specific failure.
 */
export class MideaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Socket level failure, raised once the session retries are used up */
export class MideaNetworkError extends MideaError {}

/** Malformed frame, signature mismatch or unknown reply format */
export class ProtocolError extends MideaError {}

/** Appliance type or protocol version not implemented */
export class UnsupportedError extends MideaError {}

/** Handshake, token or session failure */
export class AuthenticationError extends MideaError {}

/** Cloud reported an error code with no special handling */
export class CloudError extends MideaError {
  constructor(
    public readonly errorCode: number,
    message: string,
  ) {
    super(`Midea cloud API error: ${message} (${errorCode})`);
  }
}

/** HTTP failure talking to the cloud, or too many retries */
export class CloudRequestError extends MideaError {}

/** Cloud is throttling requests */
export class RetryLaterError extends MideaError {
  constructor(
    public readonly errorCode: number,
    message: string,
  ) {
    super(`Retry later: ${message} (${errorCode})`);
  }
}

/** Cloud rejected the account, the password or the app key */
export class CloudAuthenticationError extends MideaError {
  constructor(
    public readonly errorCode: number,
    message: string,
    public readonly account: string,
  ) {
    super(`Cloud authentication error: ${message} (${errorCode})`);
  }
}
