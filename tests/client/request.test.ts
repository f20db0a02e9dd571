import { describe, it, expect } from "vitest";
import { ActionBatch } from "../../src/client/actions.js";
import { createCredentials } from "../../src/client/credentials.js";
import {
  buildAddBody,
  buildRetrieveBody,
  buildSendBody,
  endpointUrl,
  filterAddOptions,
} from "../../src/client/request.js";
import { UNTAGGED } from "../../src/client/tags.js";

const credentials = createCredentials({
  consumerKey: "test-key",
  accessToken: "test-token",
  siteBaseUrl: "https://pocket.example.test",
});

describe("endpointUrl", () => {
  it("should append the v3 paths to the site base url", () => {
    expect(endpointUrl(credentials, "retrieve")).toBe("https://pocket.example.test/v3/get");
    expect(endpointUrl(credentials, "add")).toBe("https://pocket.example.test/v3/add");
    expect(endpointUrl(credentials, "send")).toBe("https://pocket.example.test/v3/send");
  });
});

describe("buildRetrieveBody", () => {
  it("should merge credentials with options verbatim", () => {
    expect(buildRetrieveBody(credentials, { count: 10, sort: "newest", favorite: 1 })).toEqual({
      consumer_key: "test-key",
      access_token: "test-token",
      count: 10,
      sort: "newest",
      favorite: 1,
    });
  });

  it("should default to credentials only", () => {
    expect(buildRetrieveBody(credentials)).toEqual({
      consumer_key: "test-key",
      access_token: "test-token",
    });
  });

  it("should not let options replace credentials", () => {
    const body = buildRetrieveBody(credentials, { consumer_key: "other", access_token: "other" });
    expect(body.consumer_key).toBe("test-key");
    expect(body.access_token).toBe("test-token");
  });
});

describe("buildAddBody", () => {
  it("should drop fields outside the allow-list", () => {
    expect(
      buildAddBody(credentials, {
        url: "http://example.com",
        title: "Example",
        tweet_id: "99",
        favorite: 1,
        item_id: "5",
      })
    ).toEqual({
      consumer_key: "test-key",
      access_token: "test-token",
      url: "http://example.com",
      title: "Example",
      tweet_id: "99",
    });
  });

  it("should normalize a tag list", () => {
    expect(buildAddBody(credentials, { url: "http://example.com", tags: ["a", "b"] }).tags).toBe("a, b");
  });

  it("should normalize a tag marker", () => {
    expect(filterAddOptions({ url: "http://example.com", tags: UNTAGGED })).toEqual({
      url: "http://example.com",
      tags: "_untagged_",
    });
  });

  it("should skip undefined values", () => {
    expect(filterAddOptions({ url: "http://example.com", title: undefined })).toEqual({
      url: "http://example.com",
    });
  });
});

describe("buildSendBody", () => {
  it("should wrap the stamped actions with credentials", () => {
    const batch = ActionBatch.empty().archive("1").favorite("2").stamp(new Date(1700000000000));

    expect(buildSendBody(credentials, batch)).toEqual({
      actions: [
        { action: "archive", item_id: "1", timestamp: "1700000000" },
        { action: "favorite", item_id: "2", timestamp: "1700000000" },
      ],
      consumer_key: "test-key",
      access_token: "test-token",
    });
  });

  it("should serialize to the modify wire format", () => {
    const batch = ActionBatch.empty().tagsAdd("1", ["a", "b"]).stamp(new Date(1700000000000));

    expect(JSON.parse(JSON.stringify(buildSendBody(credentials, batch)))).toEqual({
      actions: [{ action: "tags_add", item_id: "1", tags: "a, b", timestamp: "1700000000" }],
      consumer_key: "test-key",
      access_token: "test-token",
    });
  });
});
