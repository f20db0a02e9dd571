import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import { PocketClient } from "../../src/client/pocket-client.js";
import type { Transport } from "../../src/client/transport.js";
import { handleAdd, handleRetrieve, handleSendActions, toAction } from "../../src/tools/handlers.js";
import { PocketAuthError } from "../../src/utils/errors.js";

const ok = (data: unknown) => ({ statusCode: 200, headers: {}, body: JSON.stringify(data) });

describe("Tool handlers", () => {
  let transport: Mock<Transport>;
  let client: PocketClient;

  const lastBody = (): unknown => {
    const call = transport.mock.calls.at(-1);
    if (!call) throw new Error("transport was not called");
    return JSON.parse(call[0].body);
  };

  beforeEach(() => {
    transport = vi.fn<Transport>();
    client = new PocketClient(
      { consumerKey: "test-key", accessToken: "test-token" },
      { transport, now: () => new Date(1700000000000) }
    );
  });

  describe("handleRetrieve", () => {
    it("should map filters onto wire options", async () => {
      const payload = { status: 1, list: [] };
      transport.mockResolvedValueOnce(ok(payload));

      const result = await handleRetrieve(client, { favorite: true, tag: "news", count: 5 });

      expect(result).toEqual(payload);
      expect(lastBody()).toEqual({
        consumer_key: "test-key",
        access_token: "test-token",
        favorite: 1,
        tag: "news",
        count: 5,
      });
    });

    it("should send the untagged token when untagged is set", async () => {
      transport.mockResolvedValueOnce(ok({ status: 1, list: [] }));

      await handleRetrieve(client, { untagged: true, tag: "ignored" });

      expect(lastBody()).toMatchObject({ tag: "_untagged_" });
    });

    it("should throw the API error", async () => {
      transport.mockResolvedValueOnce({
        statusCode: 401,
        headers: { "X-Error-Code": "107", "X-Error": "Consumer key/access token mismatch" },
        body: "",
      });

      await expect(handleRetrieve(client, {})).rejects.toBeInstanceOf(PocketAuthError);
    });
  });

  describe("handleAdd", () => {
    it("should return the added item", async () => {
      const payload = { status: 1, item: { item_id: "10" } };
      transport.mockResolvedValueOnce(ok(payload));

      await expect(handleAdd(client, { url: "http://example.com", tags: ["a", "b"] })).resolves.toEqual(
        payload
      );
      expect(lastBody()).toMatchObject({ url: "http://example.com", tags: "a, b" });
    });
  });

  describe("toAction", () => {
    it("should keep set fields and normalize tags", () => {
      expect(toAction({ action: "tags_add", item_id: "1", tags: ["a", "b"] })).toEqual({
        action: "tags_add",
        item_id: "1",
        tags: "a, b",
      });
    });

    it("should carry tag rename fields", () => {
      expect(toAction({ action: "tag_rename", item_id: "1", old_tag: "x", new_tag: "y" })).toEqual({
        action: "tag_rename",
        item_id: "1",
        old_tag: "x",
        new_tag: "y",
      });
    });
  });

  describe("handleSendActions", () => {
    it("should send the actions in order and pair results", async () => {
      transport.mockResolvedValueOnce(
        ok({
          status: 1,
          action_results: [true, false],
          action_errors: [null, { message: "Invalid item", type: "Bad Request", code: 422 }],
        })
      );

      const summary = await handleSendActions(client, {
        actions: [
          { action: "archive", item_id: "1" },
          { action: "favorite", item_id: "2" },
        ],
      });

      expect(lastBody()).toMatchObject({
        actions: [
          { action: "archive", item_id: "1", timestamp: "1700000000" },
          { action: "favorite", item_id: "2", timestamp: "1700000000" },
        ],
      });
      expect(summary).toEqual({
        status: 1,
        timestamp: "1700000000",
        results: [
          { action: { action: "archive", item_id: "1", timestamp: "1700000000" }, ok: true },
          {
            action: { action: "favorite", item_id: "2", timestamp: "1700000000" },
            ok: false,
            error: { message: "Invalid item", type: "Bad Request", code: 422 },
          },
        ],
      });
    });
  });
});
