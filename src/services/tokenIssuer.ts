// src/services/tokenIssuer.ts

import { createHmac, randomBytes, timingSafeEqual } from "crypto";
import { StorageUnavailableError } from "../lib/errors";

const BODY_BYTES = 24;
const SIGNATURE_CHARS = 16;
const MAX_MINT_ATTEMPTS = 5;
const TOKEN_PATTERN = /^[A-Za-z0-9_-]{32}\.[A-Za-z0-9_-]{16}$/;

// Permanent registry: a token, once reserved, is never handed out again
export interface TokenRegistry {
  reserveToken(token: string, eventId: string): Promise<boolean>;
}

/**
 * Mints opaque per-guest lookup tokens of the form `<body>.<signature>`.
 * The signature lets the portal reject forged tokens without touching the
 * store; uniqueness comes from the registry.
 */
export class TokenIssuer {
  constructor(
    private readonly secret: string,
    private readonly registry: TokenRegistry,
    private readonly random: (size: number) => Buffer = randomBytes,
  ) {
    if (!secret) throw new Error("Token secret must not be empty");
  }

  async mint(eventId: string): Promise<string> {
    for (let attempt = 0; attempt < MAX_MINT_ATTEMPTS; attempt++) {
      const body = this.random(BODY_BYTES).toString("base64url");
      const token = `${body}.${this.sign(body)}`;
      if (await this.registry.reserveToken(token, eventId)) return token;
    }
    throw new StorageUnavailableError(
      `Could not reserve a unique token after ${MAX_MINT_ATTEMPTS} attempts`,
    );
  }

  verify(token: string): boolean {
    if (!TOKEN_PATTERN.test(token)) return false;
    const [body, signature] = token.split(".");
    const expected = Buffer.from(this.sign(body));
    const actual = Buffer.from(signature);
    return expected.length === actual.length && timingSafeEqual(expected, actual);
  }

  private sign(body: string): string {
    return createHmac("sha256", this.secret)
      .update(body)
      .digest("base64url")
      .slice(0, SIGNATURE_CHARS);
  }
}
