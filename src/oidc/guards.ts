/**
 * Runtime type guards for JSON data validation
 *
 * These guards replace `as Type` assertions on data coming from
 * JSON.parse(), configuration files and other untrusted sources.
 *
 * @module oidc/guards
 */

import type { ClientMetadata, SubjectType, UserClaims } from './types'
import { SUBJECT_TYPES } from './types'

// ═══════════════════════════════════════════════════════════════════════════
// Helpers
// ═══════════════════════════════════════════════════════════════════════════

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function isString(value: unknown): value is string {
  return typeof value === 'string'
}

export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && !Number.isNaN(value)
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string')
}

export function isSubjectType(value: unknown): value is SubjectType {
  return SUBJECT_TYPES.some((type) => type === value)
}

// ═══════════════════════════════════════════════════════════════════════════
// Validation Error
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Error thrown when runtime JSON validation fails
 */
export class ValidationError extends Error {
  constructor(
    public readonly expectedType: string,
    public readonly details: string,
    public readonly data?: unknown,
  ) {
    super(`Invalid ${expectedType}: ${details}`)
    this.name = 'ValidationError'
  }
}

/**
 * Assert that data passes a type guard, throwing ValidationError if not
 */
export function assertValid<T>(data: unknown, guard: (value: unknown) => value is T, typeName: string): T {
  if (!guard(data)) {
    throw new ValidationError(typeName, 'failed runtime validation', data)
  }
  return data
}

// ═══════════════════════════════════════════════════════════════════════════
// Domain Guards
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A user attribute database: user id → claims
 */
export function isUserDatabase(data: unknown): data is Record<string, UserClaims> {
  if (!isObject(data)) return false
  return Object.values(data).every((entry) => isObject(entry))
}

/**
 * Registered client metadata
 */
export function isClientMetadata(data: unknown): data is ClientMetadata {
  if (!isObject(data)) return false
  if (!isString(data['client_id'])) return false
  if (data['redirect_uris'] !== undefined && !isStringArray(data['redirect_uris'])) return false
  if (data['sector_identifier_uri'] !== undefined && !isString(data['sector_identifier_uri'])) return false
  if (data['subject_type'] !== undefined && !isSubjectType(data['subject_type'])) return false
  if (data['userinfo_signed_response_alg'] !== undefined && !isString(data['userinfo_signed_response_alg'])) return false
  return true
}

/**
 * A scope → claim names table
 */
export function isScopeClaimsTable(data: unknown): data is Record<string, string[]> {
  if (!isObject(data)) return false
  return Object.values(data).every((claims) => isStringArray(claims))
}
