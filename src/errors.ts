/**
 * Raised at construction when a corridor is empty or two neighbouring boxes do not overlap.
 */
export class CorridorInvalidError extends Error {
  constructor(message: string, public readonly boxIndex?: number) {
    super(message);
    this.name = 'CorridorInvalidError';
  }
}

export class BoxGeometryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BoxGeometryError';
  }
}

/**
 * Invalid navigator, simulation or layout settings. `issues` holds one readable line per problem.
 */
export class ConfigurationError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
  }
}

export class InvalidPoseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidPoseError';
  }
}

export class BridgeTimeoutError extends Error {
  constructor(public readonly step: number, public readonly timeoutMs: number) {
    super(`Renderer did not acknowledge step ${step} within ${timeoutMs}ms`);
    this.name = 'BridgeTimeoutError';
  }
}
