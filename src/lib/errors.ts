export class HttpError extends Error {
  readonly status: number;
  readonly url: string;
  readonly body: string;

  constructor(status: number, url: string, body: string) {
    super(`HTTP ${status}: ${body}`);
    this.name = "HttpError";
    this.status = status;
    this.url = url;
    this.body = body;
  }
}

// Meraki error bodies look like { "errors": ["Name has already been taken"] }
function parseApiErrors(body: string): string[] {
  try {
    const parsed: unknown = JSON.parse(body);
    if (parsed && typeof parsed === "object" && "errors" in parsed && Array.isArray(parsed.errors)) {
      return parsed.errors.map((e: unknown) => String(e));
    }
  } catch {
    // plain-text body
  }
  return body.trim() ? [body.trim()] : [];
}

export class DashboardApiError extends Error {
  readonly operation: string;
  readonly status: number | null;
  readonly errors: string[];

  constructor(operation: string, cause: unknown) {
    const status = cause instanceof HttpError ? cause.status : null;
    const errors = cause instanceof HttpError
      ? parseApiErrors(cause.body)
      : [cause instanceof Error ? cause.message : String(cause)];
    super(`${operation} failed${status ? ` (${status})` : ""}: ${errors.join("; ") || "no details"}`, { cause });
    this.name = "DashboardApiError";
    this.operation = operation;
    this.status = status;
    this.errors = errors;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join("\n  - ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class CsvFileNotFoundError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`File not found: ${path}`);
    this.name = "CsvFileNotFoundError";
    this.path = path;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
