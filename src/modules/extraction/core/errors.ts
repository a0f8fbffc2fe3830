/**
 * Extraction Module - Errors
 *
 * Row-level problems are never errors: malformed rows are skipped. The only
 * failure is a broken layout configuration, which is raised once at load time.
 */

export class LayoutConfigError extends Error {
  readonly layout: string;

  constructor(layout: string, message: string) {
    super(`Invalid layout "${layout}": ${message}`);
    this.name = 'LayoutConfigError';
    this.layout = layout;
  }
}
