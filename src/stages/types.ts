/**
 * Lead-Research Stage Dependencies
 *
 * @module stages/types
 */

import type { LlmClient } from '../llm/client.js';
import type { ServiceRegistry } from '../services/types.js';

/**
 * Collaborators the stage factories close over. Every field is optional;
 * stages degrade to deterministic behaviour where they can.
 */
export interface LeadResearchDeps {
  llm?: LlmClient;
  services?: ServiceRegistry;
  /** Parallel contact lookups during enrichment (default: 3) */
  enrichmentConcurrency?: number;
}
