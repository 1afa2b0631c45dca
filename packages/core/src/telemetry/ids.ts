/**
 * Telemetry ID Generation Module
 *
 * Generates W3C Trace Context compatible IDs:
 * - Trace ID: 32 hex characters (128-bit)
 * - Span ID: 16 hex characters (64-bit)
 *
 * @module @stepgraph/core/telemetry/ids
 */

import { randomBytes } from 'crypto';

// =============================================================================
// Branded Types for Type Safety
// =============================================================================

/**
 * W3C Trace Context trace ID (32 hex characters)
 */
export type TraceId = string & { readonly __brand: 'TraceId' };

/**
 * W3C Trace Context span ID (16 hex characters)
 */
export type SpanId = string & { readonly __brand: 'SpanId' };

/**
 * Identifier of a single step invocation
 */
export type InvocationId = string & { readonly __brand: 'InvocationId' };

// =============================================================================
// ID Generation
// =============================================================================

export function generateTraceId(): TraceId {
  return randomBytes(16).toString('hex') as TraceId;
}

export function generateSpanId(): SpanId {
  return randomBytes(8).toString('hex') as SpanId;
}

/**
 * Generate an invocation ID (`inv_` + 12 hex chars)
 */
export function generateInvocationId(): InvocationId {
  return `inv_${randomBytes(6).toString('hex')}` as InvocationId;
}
