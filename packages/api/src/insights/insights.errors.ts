export class NoDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NoDataError";
  }
}

export class AiNotConfiguredError extends Error {
  constructor() {
    super("AI insights are not configured. Set OPENAI_API_KEY to enable them.");
    this.name = "AiNotConfiguredError";
  }
}

/** The model answered, but not with something we can use. */
export class AiResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AiResponseError";
  }
}
