/**
 * Backend URL Validators
 *
 * Checks that each configured backend address is usable before a
 * request is issued. Environment overrides skip the config schema, so
 * the resolved settings are validated here as well.
 */

import { BackendUrlSchema } from '../config/schema.js';
import { SETUP_INSTRUCTIONS } from '../config/env.js';
import type { BackendSettings } from '../config/settings.js';
import type { BackendService } from '../errors/index.js';

// ============================================================================
// VALIDATION RESULT TYPE
// ============================================================================

/**
 * Result of validating one backend address.
 *
 * When valid: { valid: true }
 * When invalid: { valid: false, error: string, setupInstructions: string }
 */
export type ValidationResult =
  | { valid: true }
  | { valid: false; error: string; setupInstructions: string };

// ============================================================================
// VALIDATION FUNCTIONS
// ============================================================================

/**
 * Validate a single backend base URL.
 */
export function validateBackendUrl(service: BackendService, url: string): ValidationResult {
  const result = BackendUrlSchema.safeParse(url);

  if (!result.success) {
    return {
      valid: false,
      error: `${result.error.issues[0]?.message ?? 'Invalid backend URL'}: "${url}"`,
      setupInstructions: SETUP_INSTRUCTIONS[service],
    };
  }

  return { valid: true };
}

/**
 * Validate all three backend URLs.
 * Returns one entry per service, in call order.
 */
export function validateBackends(
  backends: BackendSettings
): Array<{ service: BackendService; result: ValidationResult }> {
  const urls: Array<[BackendService, string]> = [
    ['retrieval', backends.retrievalUrl],
    ['assistant', backends.assistantUrl],
    ['generation', backends.generationUrl],
  ];

  return urls.map(([service, url]) => ({ service, result: validateBackendUrl(service, url) }));
}
