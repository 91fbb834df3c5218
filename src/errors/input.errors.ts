export class SnippetCodeInvalidError extends Error {
  constructor(label: string, actualType: string) {
    super(`Snippet code for ${label} must be a string (got ${actualType}).`);
    this.name = "SnippetCodeInvalidError";
  }
}

export class SnippetIdMismatchError extends Error {
  constructor(key: string, id: string) {
    super(`Snippet collection key "${key}" does not match snippet id "${id}".`);
    this.name = "SnippetIdMismatchError";
  }
}

export class DuplicateSnippetIdError extends Error {
  constructor(id: string) {
    super(`Duplicate snippet id "${id}".`);
    this.name = "DuplicateSnippetIdError";
  }
}

export class ThresholdInvalidError extends Error {
  constructor(label: string, value: unknown) {
    super(`${label} must be an integer between 0 and 100 (got ${String(value)}).`);
    this.name = "ThresholdInvalidError";
  }
}

export class SnippetFileInvalidError extends Error {
  constructor(source: string, message: string) {
    super(`Snippet file ${source} is invalid: ${message}`);
    this.name = "SnippetFileInvalidError";
  }
}
