/** Raised for input the map builder cannot use: malformed records or CLI arguments. */
export class ClusterMapError extends Error {
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = 'ClusterMapError';
    this.details = details;
  }
}
