// ---------------------------------------------------------------------------
// Portal failures. These never leave the records service as HTTP errors;
// the kind is kept for logging only.
// ---------------------------------------------------------------------------

export class PortalError extends Error {
  override name = 'PortalError';

  constructor(message: string, public status?: number) {
    super(message);
  }
}

/** The portal refused the credentials or the session. */
export class PortalAuthError extends PortalError {
  override name = 'PortalAuthError';
}

/** The portal could not be reached or answered with a non-2xx status. */
export class PortalRequestError extends PortalError {
  override name = 'PortalRequestError';
}

/** The portal answered with a body that is not JSON. */
export class PortalResponseError extends PortalError {
  override name = 'PortalResponseError';
}

/**
 * Text shown to the caller for a failed portal interaction. Falls back to a
 * fixed message so a failure envelope never carries an empty message.
 */
export function describePortalFailure(err: unknown, fallback: string): string {
  const text = err instanceof Error ? err.message : String(err ?? '');
  return text.length > 0 ? text : fallback;
}
