export class InputError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InputError";
  }
}

export class NotFoundError extends InputError {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class StageFailedError extends Error {
  stage: string;
  messages: string[];
  constructor(stage: string, message: string, options?: { cause?: unknown; messages?: string[] }) {
    super(`${stage} failed: ${message}`, options);
    this.name = "StageFailedError";
    this.stage = stage;
    this.messages = options?.messages ?? [];
  }
}

export class CitationIntegrityError extends Error {
  problems: string[];
  constructor(problems: string[]) {
    super(`Citation integrity check failed: ${problems.join("; ")}`);
    this.name = "CitationIntegrityError";
    this.problems = problems;
  }
}

export class CancelledError extends Error {
  constructor() {
    super("Cancelled");
    this.name = "CancelledError";
  }
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function exitCodeFor(err: unknown): number {
  if (err instanceof InputError) return 2;
  return 1;
}
