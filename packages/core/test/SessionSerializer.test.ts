import { describe, expect, it } from "vitest";
import { JsonSerializer, StructuredSerializer } from "../src";

describe("StructuredSerializer", () => {
  it("keeps non-string keys and rich values", () => {
    const serializer = new StructuredSerializer();
    const objectKey = { tenant: "t1" };
    const values = new Map<unknown, unknown>([
      [1, "one"],
      ["when", new Date(Date.UTC(2024, 0, 2, 3, 4, 5))],
      ["tags", new Set(["a", "b"])],
      ["big", 12345678901234567890n],
      [objectKey, "scoped"],
    ]);

    const target = new Map<unknown, unknown>();
    serializer.deserialize(serializer.serialize(values), target);

    expect(target.get(1)).toBe("one");
    expect(target.get("when")).toEqual(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)));
    expect(target.get("tags")).toEqual(new Set(["a", "b"]));
    expect(target.get("big")).toBe(12345678901234567890n);
    const restoredKeys = [...target.keys()];
    expect(restoredKeys[4]).toEqual({ tenant: "t1" });
    expect(target.get(restoredKeys[4])).toBe("scoped");
  });

  it("merges into the target without clearing it", () => {
    const serializer = new StructuredSerializer();
    const target = new Map<unknown, unknown>([
      ["kept", true],
      ["foo", "old"],
    ]);

    serializer.deserialize(serializer.serialize(new Map([["foo", "new"]])), target);

    expect(target).toEqual(
      new Map<unknown, unknown>([
        ["kept", true],
        ["foo", "new"],
      ]),
    );
  });

  it("rejects payloads that are not value maps", () => {
    const serializer = new StructuredSerializer();

    expect(() => serializer.deserialize('{"json":{"a":1}}', new Map())).toThrow(
      "Session payload does not hold a value map.",
    );
    expect(() => serializer.deserialize("{oops", new Map())).toThrow("Failed to deserialize session payload.");
  });
});

describe("JsonSerializer", () => {
  it("encodes string-keyed values as a JSON object", () => {
    const serializer = new JsonSerializer();

    expect(serializer.serialize(new Map<unknown, unknown>([["foo", "bar"], ["n", 1]]))).toBe('{"foo":"bar","n":1}');
  });

  it("fails on the first non-string key", () => {
    const serializer = new JsonSerializer();
    const values = new Map<unknown, unknown>([
      ["ok", 1],
      [Symbol("secret"), 2],
    ]);

    expect(() => serializer.serialize(values)).toThrow(
      "non-string key value, cannot serialize session to JSON: Symbol(secret)",
    );
  });

  it("decodes into the target map", () => {
    const serializer = new JsonSerializer();
    const target = new Map<unknown, unknown>([["kept", "yes"]]);

    serializer.deserialize('{"foo":"bar","nested":{"a":[1,2]}}', target);

    expect(target.get("kept")).toBe("yes");
    expect(target.get("foo")).toBe("bar");
    expect(target.get("nested")).toEqual({ a: [1, 2] });
  });

  it("keeps a __proto__ key as a plain entry", () => {
    const serializer = new JsonSerializer();
    const values = new Map<unknown, unknown>([
      ["__proto__", { a: 1 }],
      ["x", 1],
    ]);

    const payload = serializer.serialize(values);
    expect(payload).toBe('{"__proto__":{"a":1},"x":1}');

    const target = new Map<unknown, unknown>();
    serializer.deserialize(payload, target);
    expect(target.get("__proto__")).toEqual({ a: 1 });
    expect(target.get("x")).toBe(1);
  });

  it("rejects non-object JSON", () => {
    const serializer = new JsonSerializer();

    expect(() => serializer.deserialize("[1,2]", new Map())).toThrow("Session JSON payload is not an object.");
    expect(() => serializer.deserialize("not json", new Map())).toThrow("Failed to deserialize session JSON.");
  });
});
