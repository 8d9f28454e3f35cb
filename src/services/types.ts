/**
 * External Service Interfaces
 *
 * Data providers the stages consult. Every provider is optional and
 * reports failures as a typed `ServiceResult` rather than throwing, so the
 * calling stage decides whether a failure matters.
 *
 * @module services/types
 */

// ============================================================================
// Service Result
// ============================================================================

export type ServiceResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: string; retryable: boolean };

export function serviceOk<T>(data: T): ServiceResult<T> {
  return { ok: true, data };
}

export function serviceFail<T>(error: string, retryable = false): ServiceResult<T> {
  return { ok: false, error, retryable };
}

/**
 * A service failure that reached a stage boundary.
 */
export class ServiceError extends Error {
  constructor(
    public readonly service: string,
    message: string,
    public readonly retryable: boolean
  ) {
    super(`${service}: ${message}`);
    this.name = 'ServiceError';
  }
}

/**
 * Return the data of a successful result.
 *
 * @throws ServiceError for a failed result
 */
export function unwrapService<T>(service: string, result: ServiceResult<T>): T {
  if (!result.ok) {
    throw new ServiceError(service, result.error, result.retryable);
  }
  return result.data;
}

// ============================================================================
// Providers
// ============================================================================

export interface CallOptions {
  signal?: AbortSignal;
}

export interface SearchHit {
  title: string;
  url: string;
  snippet: string;
}

/**
 * General web search used as evidence for company discovery.
 */
export interface WebSearchService {
  readonly name: string;
  search(query: string, options?: CallOptions & { limit?: number }): Promise<ServiceResult<SearchHit[]>>;
}

export interface NetworkProfile {
  name: string;
  title: string;
  profileUrl?: string;
  location?: string;
}

export interface PeopleQuery {
  company: string;
  /** Titles to look for; empty means any senior title */
  titles: string[];
}

/**
 * Professional-network lookup of people at a company.
 */
export interface ProfessionalNetworkService {
  readonly name: string;
  findPeople(query: PeopleQuery, options?: CallOptions): Promise<ServiceResult<NetworkProfile[]>>;
}

export interface ContactQuery {
  name: string;
  company: string;
  title?: string;
  website?: string;
}

export interface ContactRecord {
  name: string;
  email?: string;
  phone?: string;
  /** Provider that supplied the contact */
  source: string;
}

/**
 * Contact details for a named person. `null` data means no match.
 */
export interface ContactEnrichmentService {
  readonly name: string;
  findContact(query: ContactQuery, options?: CallOptions): Promise<ServiceResult<ContactRecord | null>>;
}

/**
 * Providers wired into a pipeline. All are optional.
 */
export interface ServiceRegistry {
  webSearch?: WebSearchService;
  professionalNetwork?: ProfessionalNetworkService;
  contactEnrichment?: ContactEnrichmentService;
}
