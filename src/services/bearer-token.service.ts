// src/services/bearer-token.service.ts
/**
 * Bearer-token scheme for dashboard clients.
 *
 * The token is an ID token issued by Firebase Authentication; verification is
 * delegated to the Firebase Admin SDK behind the `TokenVerifier` interface so
 * tests (and other identity providers) can plug in their own verifier.
 */
import fs from "fs";
import { cert, initializeApp, type App, type ServiceAccount } from "firebase-admin/app";
import { getAuth } from "firebase-admin/auth";
import type { FirebaseConfig } from "../config";
import type { AuthRequest, Authenticator } from "../interfaces/authenticator.interface";
import type { Principal } from "../interfaces/principal.interface";
import { UnauthorizedError } from "../errors/app-error";
import { logger } from "../logger";

export interface VerifiedToken {
  uid: string;
  email?: string;
}

export interface TokenVerifier {
  verify(token: string): Promise<VerifiedToken>;
}

const BEARER_PREFIX = "Bearer ";

export function extractBearerToken(header: string | undefined): string | null {
  if (!header || !header.startsWith(BEARER_PREFIX)) return null;
  const token = header.slice(BEARER_PREFIX.length).trim();
  return token || null;
}

export class BearerTokenAuthenticator implements Authenticator {
  readonly scheme = "bearer" as const;

  constructor(private readonly verifier: TokenVerifier) {}

  async authenticate(req: AuthRequest): Promise<Principal> {
    const token = extractBearerToken(req.headers.authorization);
    if (!token) {
      throw new UnauthorizedError("Missing or invalid token");
    }

    try {
      const { uid, email } = await this.verifier.verify(token);
      return { scheme: this.scheme, uid, email };
    } catch (err) {
      logger.warn(`Bearer token rejected: ${err instanceof Error ? err.message : String(err)}`);
      throw new UnauthorizedError("Unauthorized: Invalid token");
    }
  }
}

/* ================= Firebase ================= */

function readServiceAccount(raw: string): ServiceAccount {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null) {
    throw new Error("Firebase credentials must be a JSON object");
  }

  const field = (name: string): string => {
    const value: unknown = Reflect.get(parsed, name);
    if (typeof value !== "string" || !value) {
      throw new Error(`Firebase credentials are missing "${name}"`);
    }
    return value;
  };

  return {
    projectId: field("project_id"),
    clientEmail: field("client_email"),
    privateKey: field("private_key"),
  };
}

export class FirebaseTokenVerifier implements TokenVerifier {
  constructor(private readonly app: App) {}

  async verify(token: string): Promise<VerifiedToken> {
    const decoded = await getAuth(this.app).verifyIdToken(token);
    return { uid: decoded.uid, email: decoded.email };
  }
}

class UnconfiguredTokenVerifier implements TokenVerifier {
  async verify(): Promise<VerifiedToken> {
    throw new Error("Identity provider is not configured");
  }
}

/**
 * Inline JSON (FIREBASE_CREDENTIALS) wins over a file path (FIREBASE_JSON_PATH).
 * Without either, every bearer token is rejected.
 */
export function createTokenVerifier(firebase: FirebaseConfig): TokenVerifier {
  let raw: string | undefined = firebase.credentialsJson;

  if (!raw && firebase.credentialsPath) {
    if (!fs.existsSync(firebase.credentialsPath)) {
      logger.error(`Firebase JSON file not found at: ${firebase.credentialsPath}`);
      return new UnconfiguredTokenVerifier();
    }
    raw = fs.readFileSync(firebase.credentialsPath, "utf8");
  }

  if (!raw) return new UnconfiguredTokenVerifier();

  const app = initializeApp({ credential: cert(readServiceAccount(raw)) });
  logger.info("Firebase initialized");
  return new FirebaseTokenVerifier(app);
}
