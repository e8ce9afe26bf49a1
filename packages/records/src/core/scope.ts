import type { PrincipalId } from "../ports/principal"
import type { StoredRecord } from "../ports/record"
import type { RecordTypeDefinition } from "../ports/record-type"
import { RecordError } from "./record-error"

const ISSUER = Symbol("scope-issuer")

/**
 * Rows of one record type owned by one principal. Issued only by
 * `OwnershipEnforcer.scopeFor`.
 */
export class OwnerScope {
  readonly kind = "owner"
  readonly #issued: typeof ISSUER

  constructor(
    issuer: symbol,
    readonly recordType: string,
    readonly ownerField: string,
    readonly ownerId: PrincipalId,
  ) {
    if (issuer !== ISSUER) throw new TypeError("Scopes are issued by OwnershipEnforcer")

    this.#issued = ISSUER
  }

  includes(record: StoredRecord): boolean {
    return this.#issued === ISSUER && String(record[this.ownerField]) === this.ownerId
  }
}

/**
 * Every row of one record type, regardless of owner. Issued only by
 * `OwnershipEnforcer.administrative`, which audits it.
 */
export class AdministrativeScope {
  readonly kind = "administrative"
  readonly #issued: typeof ISSUER

  constructor(
    issuer: symbol,
    readonly recordType: string,
    readonly actor: string,
    readonly reason: string,
  ) {
    if (issuer !== ISSUER) throw new TypeError("Scopes are issued by OwnershipEnforcer")

    this.#issued = ISSUER
  }

  includes(_record: StoredRecord): boolean {
    return this.#issued === ISSUER
  }
}

export type RecordScope = OwnerScope | AdministrativeScope

export function issueOwnerScope<R extends StoredRecord>(
  definition: RecordTypeDefinition<R>,
  ownerId: PrincipalId,
): OwnerScope {
  return new OwnerScope(ISSUER, definition.name, definition.ownerField, ownerId)
}

export function issueAdministrativeScope<R extends StoredRecord>(
  definition: RecordTypeDefinition<R>,
  actor: string,
  reason: string,
): AdministrativeScope {
  return new AdministrativeScope(ISSUER, definition.name, actor, reason)
}

/** Throws when `scope` was issued for a different record type. */
export function assertScopeFor<R extends StoredRecord>(
  definition: RecordTypeDefinition<R>,
  scope: RecordScope,
): void {
  if (scope.recordType !== definition.name) {
    throw RecordError.scopeMismatch(definition.name, scope.recordType)
  }
}
