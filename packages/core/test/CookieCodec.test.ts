import { afterEach, describe, expect, it, vi } from "vitest";
import {
  JoseCookieCodec,
  codecsFromPairs,
  decodeMulti,
  encodeMulti,
  supportsMaxAge,
  type CookieCodec,
} from "../src";

const HASH_KEY = "test-secret-hash-key-0123456789ab";
const BLOCK_KEY = "0123456789abcdef0123456789abcdef";

describe("JoseCookieCodec", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("round-trips a signed value", async () => {
    const codec = new JoseCookieCodec({ hashKey: HASH_KEY });

    const encoded = await codec.encode("sid", "SESSIONID");

    expect(encoded.split(".")).toHaveLength(3);
    await expect(codec.decode("sid", encoded)).resolves.toBe("SESSIONID");
  });

  it("encrypts when a block key is configured", async () => {
    const codec = new JoseCookieCodec({ hashKey: HASH_KEY, blockKey: BLOCK_KEY });

    const encoded = await codec.encode("sid", "SESSIONID");

    expect(encoded.split(".")).toHaveLength(5);
    expect(encoded).not.toContain("SESSIONID");
    await expect(codec.decode("sid", encoded)).resolves.toBe("SESSIONID");

    const wrongBlock = new JoseCookieCodec({ hashKey: HASH_KEY, blockKey: "fedcba9876543210fedcba9876543210" });
    await expect(wrongBlock.decode("sid", encoded)).rejects.toThrow();
  });

  it("rejects values signed with another key", async () => {
    const encoded = await new JoseCookieCodec({ hashKey: HASH_KEY }).encode("sid", "SESSIONID");
    const other = new JoseCookieCodec({ hashKey: "test-secret-other-key-0123456789" });

    await expect(other.decode("sid", encoded)).rejects.toThrow();
  });

  it("rejects block keys of unsupported length", () => {
    expect(() => new JoseCookieCodec({ hashKey: HASH_KEY, blockKey: "short" })).toThrow(
      "blockKey must be 16, 24 or 32 bytes, got 5.",
    );
    expect(() => new JoseCookieCodec({ hashKey: "" })).toThrow("hashKey must not be empty.");
  });

  it("enforces the freshness window and follows setMaxAge", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2025-01-01T00:00:00Z"));

    const codec = new JoseCookieCodec({ hashKey: HASH_KEY }, 60);
    const encoded = await codec.encode("sid", "SESSIONID");

    vi.setSystemTime(new Date("2025-01-01T00:00:30Z"));
    await expect(codec.decode("sid", encoded)).resolves.toBe("SESSIONID");

    vi.setSystemTime(new Date("2025-01-01T00:01:01Z"));
    await expect(codec.decode("sid", encoded)).rejects.toThrow();

    codec.setMaxAge(120);
    expect(codec.getMaxAge()).toBe(120);
    await expect(codec.decode("sid", encoded)).resolves.toBe("SESSIONID");

    vi.setSystemTime(new Date("2025-01-02T00:00:00Z"));
    codec.setMaxAge(0);
    await expect(codec.decode("sid", encoded)).resolves.toBe("SESSIONID");
  });
});

describe("multi-codec helpers", () => {
  it("decodeMulti falls through to a later codec", async () => {
    const [current, previous] = codecsFromPairs([
      { hashKey: "test-secret-new-key-0123456789abc" },
      { hashKey: HASH_KEY },
    ]);
    if (!current || !previous) throw new Error("expected two codecs");

    const encoded = await previous.encode("sid", "OLD");

    await expect(decodeMulti("sid", encoded, [current, previous])).resolves.toBe("OLD");
  });

  it("decodeMulti reports INVALID_SESSION when every codec fails", async () => {
    const codecs = codecsFromPairs([{ hashKey: HASH_KEY }, { hashKey: "test-secret-other-key-0123456789" }]);

    await expect(decodeMulti("sid", "garbage", codecs)).rejects.toMatchObject({
      code: "INVALID_SESSION",
      details: { cookieName: "sid", attempts: 2 },
    });
  });

  it("encodeMulti uses the first codec that succeeds", async () => {
    const failing: CookieCodec = {
      encode: async () => {
        throw new Error("no");
      },
      decode: async () => {
        throw new Error("no");
      },
    };
    const working = new JoseCookieCodec({ hashKey: HASH_KEY });

    const encoded = await encodeMulti("sid", "ID", [failing, working]);

    await expect(working.decode("sid", encoded)).resolves.toBe("ID");
  });

  it("both helpers need at least one codec", async () => {
    await expect(encodeMulti("sid", "ID", [])).rejects.toMatchObject({ code: "CONFIGURATION_ERROR" });
    await expect(decodeMulti("sid", "x", [])).rejects.toMatchObject({ code: "CONFIGURATION_ERROR" });
  });

  it("supportsMaxAge detects the capability", () => {
    const plain: CookieCodec = {
      encode: async (_name, value) => value,
      decode: async (_name, value) => value,
    };

    expect(supportsMaxAge(plain)).toBe(false);
    expect(supportsMaxAge(new JoseCookieCodec({ hashKey: HASH_KEY }))).toBe(true);
  });
});
