/** A scenario file that cannot be read as a resolution scenario. */
export class ScenarioError extends Error {
  override name = "ScenarioError";
  readonly path: string;

  constructor(path: string, reason: string) {
    super(path ? `${path}: ${reason}` : reason);
    this.path = path;
  }
}
