// Raised before any timestep is computed when the input table lacks required columns.
export class MissingFieldError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`The following required columns are missing: ${missing.join(', ')}`);
    this.name = 'MissingFieldError';
    this.missing = missing;
  }
}
