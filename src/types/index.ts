export type * from './analysis.js';
export type * from './candidates.js';
export type * from './execution.js';
export type * from './fingerprint.js';
export type * from './pipeline.js';
export type * from './recipe-health.js';
export type * from './recipe.js';
export type * from './recording.js';
export {
  RecipeError,
  RECIPE_ERROR_KINDS,
  isRecipeError,
  isRetryableKind,
  classifyHttpStatus,
  classifySystemError,
} from './errors.js';
export type { RecipeErrorKind, ErrorStage, RecipeErrorOptions, StructuredRecipeError } from './errors.js';
export { TRANSPORT_ORDER } from './recipe.js';
