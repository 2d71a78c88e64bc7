/**
 * Conversion of thrown values into the structured error envelope
 */

import {
  RecipeError,
  classifySystemError,
  isRetryableKind,
  type ErrorStage,
  type StructuredRecipeError,
} from '../types/errors.js';
import { redactText } from './redaction.js';

function systemErrorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Normalize anything thrown into a RecipeError
 */
export function toRecipeError(error: unknown, stage: ErrorStage): RecipeError {
  if (error instanceof RecipeError) return error;

  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return new RecipeError('timed-out', 'Operation aborted before completion', {
        stage,
        reasons: ['aborted'],
        cause: error,
      });
    }
    const { kind, reason } = classifySystemError(systemErrorCode(error));
    return new RecipeError(kind, error.message, { stage, reasons: [reason], cause: error });
  }

  return new RecipeError('upstream-error', String(error), { stage, reasons: ['internal'] });
}

/**
 * Build the caller-facing envelope. Retryability is decided here from the kind
 * alone; callers that must suppress retries (cancellation) override it.
 */
export function toStructuredError(error: unknown, stage: ErrorStage): StructuredRecipeError {
  const recipeError = toRecipeError(error, stage);
  const envelope: StructuredRecipeError = {
    kind: recipeError.kind,
    message: redactText(recipeError.message),
    retryable: isRetryableKind(recipeError.kind),
    stage: recipeError.stage,
    reasons: [...recipeError.reasons],
  };
  if (recipeError.status !== undefined) envelope.status = recipeError.status;
  if (recipeError.suggestedDelayMs !== undefined) envelope.suggestedDelayMs = recipeError.suggestedDelayMs;
  return envelope;
}
