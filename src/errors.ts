/** Malformed or out-of-range input; nothing of the input is accepted */
export class ParameterError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.length === 1 ? issues[0] : `${issues.length} parameter issues: ${issues.join('; ')}`);
    this.name = 'ParameterError';
    this.issues = issues;
  }
}

/** Layer/opening clipping produced something that cannot be cut into a face */
export class GeometryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GeometryError';
  }
}
