export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

export class CorpusError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CorpusError";
  }
}

/** Non-2xx or malformed reply from the embedding or completion API. */
export class ServiceError extends Error {
  constructor(
    readonly service: "embedding" | "completion",
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = "ServiceError";
  }
}

export class IndexNotReadyError extends Error {
  constructor(collection: string) {
    super(
      `Collection "${collection}" is not open. Call probe() or rebuild() first.`,
    );
    this.name = "IndexNotReadyError";
  }
}

export class ConversationNotFoundError extends Error {
  constructor(readonly conversationId: string) {
    super(`Conversation not found: ${conversationId}`);
    this.name = "ConversationNotFoundError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
