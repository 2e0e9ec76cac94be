import {
  isWellFormedToken,
  jsonValueSchema,
  payloadUserId,
  tokenRecordSchema,
} from "../schema";

describe("isWellFormedToken", () => {
  it("accepts 64 lowercase hex characters", () => {
    expect(isWellFormedToken("0123456789abcdef".repeat(4))).toBe(true);
  });

  it.each([
    ["too short", "ab".repeat(31)],
    ["too long", "ab".repeat(33)],
    ["uppercase", "AB".repeat(32)],
    ["not hex", "zz".repeat(32)],
    ["empty", ""],
  ])("rejects a token that is %s", (_label, token) => {
    expect(isWellFormedToken(token)).toBe(false);
  });
});

describe("payloadUserId", () => {
  it.each([
    [{ user_id: 42 }, "42"],
    [{ user_id: "42" }, "42"],
    [{ user_id: true }, "true"],
    [{ user_id: null }, null],
    [{ user_id: { id: 1 } }, null],
    [{ user: 42 }, null],
    [[{ user_id: 42 }], null],
    ["42", null],
    [null, null],
  ])("of %j is %j", (payload, expected) => {
    expect(payloadUserId(payload)).toBe(expected);
  });
});

describe("jsonValueSchema", () => {
  it("accepts nested JSON", () => {
    const value = { a: [1, "two", null, { b: false }] };
    expect(jsonValueSchema.parse(value)).toStrictEqual(value);
  });

  it("rejects values JSON cannot carry", () => {
    expect(jsonValueSchema.safeParse(undefined).success).toBe(false);
    expect(jsonValueSchema.safeParse({ at: new Date(0) }).success).toBe(false);
  });
});

describe("tokenRecordSchema", () => {
  it("requires an integer modifiedAt", () => {
    const token = "ab".repeat(32);
    expect(
      tokenRecordSchema.safeParse({ token, payload: null, modifiedAt: 1 })
        .success,
    ).toBe(true);
    expect(
      tokenRecordSchema.safeParse({ token, payload: null, modifiedAt: 1.5 })
        .success,
    ).toBe(false);
  });
});
