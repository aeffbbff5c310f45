/**
 * Base error class for all crate-envelope errors
 */
export class CrateEnvelopeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = "CrateEnvelopeError";

    // Maintain proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CrateEnvelopeError);
    }
  }
}

/**
 * Error thrown when resolution leaves a sensitive entity with no recipient keys
 */
export class NoValidKeysError extends CrateEnvelopeError {
  constructor(
    public readonly entityId: string,
    public readonly missingMembers: string[] = [],
  ) {
    super(
      `No recipient of "${entityId}" has a valid public key for encryption` +
        (missingMembers.length > 0
          ? `. Missing members: ${missingMembers.join(", ")}`
          : ""),
      "NO_VALID_KEYS",
    );
    this.name = "NoValidKeysError";
  }
}

/**
 * Error thrown when a declared recipient lacks a usable key and missing members are not allowed
 */
export class MissingMemberError extends CrateEnvelopeError {
  constructor(
    public readonly entityId: string,
    public readonly missingMembers: string[],
  ) {
    super(
      `At least one recipient of "${entityId}" lacks a valid key. ` +
        `Missing members: ${missingMembers.join(", ")}`,
      "MISSING_MEMBER",
    );
    this.name = "MissingMemberError";
  }
}

/**
 * Error thrown when the encryption backend refuses an operation
 */
export class BackendFailureError extends CrateEnvelopeError {
  constructor(
    message: string,
    public readonly operation: "encrypt" | "decrypt" | "fetch",
    public readonly status: string,
    public readonly fingerprints: string[] = [],
    cause?: Error,
  ) {
    super(message, "BACKEND_FAILURE", cause);
    this.name = "BackendFailureError";
  }
}

/**
 * Reported (never thrown) when a keyserver returns a partial or malformed result
 */
export class KeyserverWarning extends CrateEnvelopeError {
  constructor(
    message: string,
    public readonly keyserver: string,
    public readonly fingerprint?: string,
    public readonly status?: string,
  ) {
    super(message, "KEYSERVER_WARNING");
    this.name = "KeyserverWarning";
  }
}

/**
 * Error thrown when a crate document or an envelope has an invalid shape
 */
export class InvalidEnvelopeError extends CrateEnvelopeError {
  constructor(
    message: string,
    public readonly expectedFormat: string,
    public readonly actualFormat?: string,
    cause?: Error,
  ) {
    super(message, "INVALID_ENVELOPE", cause);
    this.name = "InvalidEnvelopeError";
  }
}

/**
 * Error thrown when invalid parameters are provided
 */
export class InvalidParameterError extends CrateEnvelopeError {
  constructor(
    message: string,
    public readonly parameter: string,
    public readonly value: unknown,
  ) {
    super(message, "INVALID_PARAMETER", undefined);
    this.name = "InvalidParameterError";
  }
}
