import { describe, expect, it } from "vitest";
import { toJsonValue } from "./json-value.js";

describe("toJsonValue", () => {
  it("converts bus values that JSON cannot hold", () => {
    expect(
      toJsonValue({
        busnum: 3n,
        serial: 2n ** 63n,
        descriptor: Buffer.from([1, 2, 3]),
        ratio: Number.NaN,
        nested: [{ missing: undefined }],
      })
    ).toEqual({
      busnum: 3,
      serial: "9223372036854775808",
      descriptor: "AQID",
      ratio: null,
      nested: [{ missing: null }],
    });
  });
});
