export type AssistantErrorCode = "load_error" | "not_found" | "empty_input";

export class AssistantError extends Error {
  constructor(
    readonly code: AssistantErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Dataset missing required columns, required cells, or not parseable at all. */
export class LoadError extends AssistantError {
  constructor(
    message: string,
    readonly missingColumns: string[] = [],
  ) {
    super("load_error", message);
  }
}

export class NotFoundError extends AssistantError {
  constructor(readonly selection: string) {
    super("not_found", `Product not found: ${selection}`);
  }
}

export class EmptyInputError extends AssistantError {
  constructor() {
    super("empty_input", "Question must not be empty");
  }
}
