import type { Logger } from "@tenantry/logger"
import type { Principal } from "../ports/principal"
import type { StoredRecord } from "../ports/record"
import type { RecordTypeDefinition } from "../ports/record-type"
import { AccessError } from "./access-error"
import { RecordError } from "./record-error"
import {
  type AdministrativeScope,
  issueAdministrativeScope,
  issueOwnerScope,
  type OwnerScope,
  type RecordScope,
} from "./scope"

export type OwnershipEnforcerDeps = {
  logger: Logger
}

export type OverrideRequest = {
  /** Who is bypassing, e.g. an operator id or job name. */
  actor: string
  reason: string
}

/**
 * The single place row-ownership scopes come from. Stores accept nothing
 * else, so every query is scoped.
 */
export class OwnershipEnforcer {
  constructor(private readonly deps: OwnershipEnforcerDeps) {}

  /**
   * Rows whose owner field equals the principal's id.
   *
   * @throws AccessError `unauthenticated_access` when no principal is bound
   */
  scopeFor<R extends StoredRecord>(
    definition: RecordTypeDefinition<R>,
    principal: Principal | undefined,
  ): OwnerScope {
    if (!principal || principal.id.length === 0) {
      throw AccessError.unauthenticated(definition.name)
    }

    return issueOwnerScope(definition, principal.id)
  }

  /**
   * Cross-owner access for maintenance work. Audited at warn.
   *
   * @throws RecordError `invalid_override` without an actor or reason
   */
  administrative<R extends StoredRecord>(
    definition: RecordTypeDefinition<R>,
    request: OverrideRequest,
  ): AdministrativeScope {
    const actor = request.actor.trim()
    const reason = request.reason.trim()

    if (actor.length === 0 || reason.length === 0) {
      throw RecordError.invalidOverride(definition.name, request.actor)
    }

    this.deps.logger.warn("ownership scope bypassed", {
      recordType: definition.name,
      actor,
      reason,
    })

    return issueAdministrativeScope(definition, actor, reason)
  }

  /**
   * @throws AccessError `not_found` when `record` lies outside `scope`
   */
  assertVisible<R extends StoredRecord>(
    definition: RecordTypeDefinition<R>,
    record: R,
    scope: RecordScope,
  ): void {
    if (scope.recordType !== definition.name || !scope.includes(record)) {
      throw AccessError.notFound(definition.name, record.id)
    }
  }
}
