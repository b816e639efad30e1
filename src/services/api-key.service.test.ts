import { describe, expect, it } from "vitest";
import { UnauthorizedError } from "../errors/app-error";
import { API_KEY_ERROR, ApiKeyService, StaticKeyAuthenticator } from "./api-key.service";

describe("ApiKeyService", () => {
  const service = new ApiKeyService(["first-key", "second-key"]);

  it("accepts any configured key", () => {
    expect(service.validate("first-key")).toBe(true);
    expect(service.validate("second-key")).toBe(true);
  });

  it("rejects unknown, partial and missing keys", () => {
    expect(service.validate("third-key")).toBe(false);
    expect(service.validate("first-ke")).toBe(false);
    expect(service.validate("")).toBe(false);
    expect(service.validate(undefined)).toBe(false);
  });
});

describe("StaticKeyAuthenticator", () => {
  const authenticator = new StaticKeyAuthenticator(new ApiKeyService(["test-api-key"]));

  it("resolves the api-key principal", async () => {
    await expect(
      authenticator.authenticate({ headers: { "x-api-key": "test-api-key" } })
    ).resolves.toEqual({ scheme: "api-key" });
  });

  it("rejects a wrong key with 401", async () => {
    const attempt = authenticator.authenticate({ headers: { "x-api-key": "nope" } });

    await expect(attempt).rejects.toBeInstanceOf(UnauthorizedError);
    await expect(attempt).rejects.toMatchObject({ status: 401, message: API_KEY_ERROR });
  });

  it("rejects a missing header", async () => {
    await expect(authenticator.authenticate({ headers: {} })).rejects.toMatchObject({
      status: 401,
      message: "Api key is wrong or not found",
    });
  });
});
