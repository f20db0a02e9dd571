import { describe, it, expect } from "vitest";
import { createCredentials } from "../../src/client/credentials.js";
import { PocketConfigError } from "../../src/utils/errors.js";

describe("createCredentials", () => {
  it("should default the site base url", () => {
    expect(createCredentials({ consumerKey: "test-key", accessToken: "test-token" })).toEqual({
      consumerKey: "test-key",
      accessToken: "test-token",
      siteBaseUrl: "https://getpocket.com",
    });
  });

  it("should accept wire-style keys", () => {
    expect(createCredentials({ consumer_key: "test-key", access_token: "test-token" })).toEqual({
      consumerKey: "test-key",
      accessToken: "test-token",
      siteBaseUrl: "https://getpocket.com",
    });
  });

  it("should keep a custom site and drop trailing slashes", () => {
    const credentials = createCredentials({
      consumerKey: "test-key",
      accessToken: "test-token",
      siteBaseUrl: "https://pocket.example.test//",
    });
    expect(credentials.siteBaseUrl).toBe("https://pocket.example.test");
  });

  it("should accept an existing credentials value", () => {
    const first = createCredentials({ consumerKey: "test-key", accessToken: "test-token" });
    expect(createCredentials(first)).toEqual(first);
  });

  it("should freeze the result", () => {
    const credentials = createCredentials({ consumerKey: "test-key", accessToken: "test-token" });
    expect(Object.isFrozen(credentials)).toBe(true);
  });

  it("should reject a blank consumer key", () => {
    expect(() => createCredentials({ consumerKey: "  ", accessToken: "test-token" })).toThrow(
      PocketConfigError
    );
  });

  it("should keep surrounding whitespace in keys", () => {
    const credentials = createCredentials({ consumerKey: " test-key ", accessToken: "test-token\t" });

    expect(credentials.consumerKey).toBe(" test-key ");
    expect(credentials.accessToken).toBe("test-token\t");
  });

  it("should reject an invalid site url", () => {
    expect(() =>
      createCredentials({ consumerKey: "test-key", accessToken: "test-token", siteBaseUrl: "not a url" })
    ).toThrow(PocketConfigError);
  });
});
