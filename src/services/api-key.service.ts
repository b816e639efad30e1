// src/services/api-key.service.ts
import type { AuthRequest, Authenticator } from "../interfaces/authenticator.interface";
import type { Principal } from "../interfaces/principal.interface";
import { UnauthorizedError } from "../errors/app-error";
import { safeEqual } from "../utils/hmac.utils";

export const API_KEY_HEADER = "x-api-key";
export const API_KEY_ERROR = "Api key is wrong or not found";

export class ApiKeyService {
  private readonly keys: readonly string[];

  constructor(keys: readonly string[]) {
    this.keys = keys.filter(Boolean);
  }

  validate(apiKey: string | undefined): boolean {
    if (!apiKey) return false;

    // Check every key so timing does not reveal which one matched.
    let valid = false;
    for (const key of this.keys) {
      if (safeEqual(apiKey, key)) valid = true;
    }
    return valid;
  }
}

/**
 * Static shared-secret scheme used by the mobile client (`X-API-Key` header).
 */
export class StaticKeyAuthenticator implements Authenticator {
  readonly scheme = "api-key" as const;

  constructor(private readonly apiKeyService: ApiKeyService) {}

  async authenticate(req: AuthRequest): Promise<Principal> {
    const raw = req.headers[API_KEY_HEADER];
    const key = Array.isArray(raw) ? raw[0] : raw;

    if (!this.apiKeyService.validate(key)) {
      throw new UnauthorizedError(API_KEY_ERROR);
    }
    return { scheme: this.scheme };
  }
}
