// src/lib/adminCapability.ts

/**
 * Proof that the caller already authorized an admin. Only the HTTP layer
 * grants one, after checking the bearer credential; engine mutations take it
 * as their first argument.
 */
export class AdminCapability {
  private constructor(
    readonly actor: string,
    readonly grantedAt: Date,
  ) {}

  static grant(actor: string): AdminCapability {
    return new AdminCapability(actor, new Date());
  }
}
