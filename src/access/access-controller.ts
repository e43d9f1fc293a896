/**
 * AccessController — the single privileged identity.
 *
 * Immutable: transferOwnership returns a new controller. Admin operations
 * elsewhere receive a controller as their guard and call requireOwner before
 * computing any change.
 */

import { InvalidArgumentError, UnauthorizedError } from "../shared/errors.js";
import { type Identity, isNullIdentity } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";

/** What admin operations need from access control. */
export interface OwnerGuard {
	requireOwner(caller: Identity): Result<void, UnauthorizedError>;
}

export class AccessController implements OwnerGuard {
	readonly owner: Identity;

	private constructor(owner: Identity) {
		this.owner = owner;
	}

	/** @throws InvalidArgumentError when owner is the null identity */
	static create(owner: Identity): AccessController {
		if (isNullIdentity(owner)) {
			throw new InvalidArgumentError("Owner cannot be the null identity", { owner });
		}
		return new AccessController(owner);
	}

	isOwner(caller: Identity): boolean {
		return caller === this.owner;
	}

	requireOwner(caller: Identity): Result<void, UnauthorizedError> {
		if (!this.isOwner(caller)) {
			return err(new UnauthorizedError("Caller is not the owner", { caller }));
		}
		return ok(undefined);
	}

	transferOwnership(
		caller: Identity,
		newOwner: Identity,
	): Result<AccessController, UnauthorizedError | InvalidArgumentError> {
		const guard = this.requireOwner(caller);
		if (!guard.ok) return guard;
		if (isNullIdentity(newOwner)) {
			return err(new InvalidArgumentError("New owner cannot be the null identity", { caller }));
		}
		return ok(new AccessController(newOwner));
	}
}
