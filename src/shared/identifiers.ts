/**
 * Domain primitive identifiers — branded types for compile-time safety.
 *
 * A PoolId is a plain integer at runtime and an Identity a plain string, but
 * the brands stop a participant being passed where a pool is expected.
 */

import { InvalidArgumentError } from "./errors.js";

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Sequential pool identifier, assigned from 0 and never reused. */
export type PoolId = Brand<number, "PoolId">;
/** Caller identity as delivered by the transport layer (already authenticated). */
export type Identity = Brand<string, "Identity">;

// ── Factory functions with validation ────────────────────────────────

/** Create a validated PoolId. Throws InvalidArgumentError unless a non-negative safe integer. */
export function poolId(value: number): PoolId {
	if (!Number.isSafeInteger(value) || value < 0) {
		throw new InvalidArgumentError(`PoolId must be a non-negative integer, got: ${value}`, {
			value,
		});
	}
	return value as PoolId;
}

/** Create a validated Identity from a raw string. Throws if empty. */
export function identity(value: string): Identity {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new InvalidArgumentError("Identity cannot be empty");
	}
	return trimmed as Identity;
}

/** The zero address. Never a valid owner. */
export const NULL_IDENTITY: Identity = identity("0x0000000000000000000000000000000000000000");

const NULL_IDENTITY_PATTERN = /^0x0{40}$/i;

export function isNullIdentity(id: Identity): boolean {
	return NULL_IDENTITY_PATTERN.test(id);
}

/** Map key for a (pool, participant) pair. */
export function positionKey(pool: PoolId, participant: Identity): string {
	return `${pool}:${participant}`;
}
