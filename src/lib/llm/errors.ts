import type { LLMErrorKind } from "./types";

export class LLMError extends Error {
  constructor(message: string, public readonly kind: LLMErrorKind) {
    super(message);
    this.name = "LLMError";
  }
}

export function errorKindOf(error: unknown): LLMErrorKind {
  return error instanceof LLMError ? error.kind : "provider";
}

export function errorMessageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
