/**
 * Central Timeout Configuration
 *
 * All timeout values should be imported from this module to ensure
 * consistent behavior across the codebase.
 */

/**
 * Default timeout values in milliseconds
 */
export const TIMEOUTS = {
  /**
   * Hard wall-clock limit for one recipe call on the online path.
   * Much smaller than the browser agent's budget.
   */
  RECIPE_CALL: 15000,

  /**
   * Browser agent run (external collaborator)
   */
  AGENT_TASK: 300000,

  /**
   * Minimizer wall-clock budget for one draft
   */
  MINIMIZER_BUDGET: 30000,

  /**
   * Verifier wall-clock budget for one verification run
   */
  VERIFIER_BUDGET: 30000,

  /**
   * Browser session idle expiry
   */
  SESSION_IDLE: 60000,

  /**
   * Browser session maximum lifetime
   */
  SESSION_MAX_LIFETIME: 600000,

  /**
   * DNS answer cache lifetime
   */
  DNS_CACHE_TTL: 30000,
} as const;
