// Configuration problems surface at construction time
export class VectorStoreConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VectorStoreConfigError";
  }
}

export class VectorStoreFilterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VectorStoreFilterError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
