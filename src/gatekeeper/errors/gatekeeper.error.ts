export class GatekeeperError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised at startup when options or route policies cannot be honoured
 */
export class GatekeeperConfigError extends GatekeeperError {
  constructor(message: string) {
    super(message, 'GATEKEEPER_CONFIG');
  }
}

export class RequestTimeoutError extends GatekeeperError {
  constructor(timeoutMs: number) {
    super(`Request exceeded ${timeoutMs}ms`, 'GATEKEEPER_TIMEOUT');
  }
}

export class ClientDisconnectedError extends GatekeeperError {
  constructor() {
    super('Client closed the connection', 'GATEKEEPER_CLIENT_GONE');
  }
}
