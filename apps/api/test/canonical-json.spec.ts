import { canonicalJson, encodeCanonicalBase64 } from "../src/common/canonical-json";

describe("canonicalJson", () => {
  it("sorts keys recursively without whitespace", () => {
    expect(canonicalJson({ b: 1, a: { d: [3, { z: true, y: null }], c: "x" } })).toBe(
      '{"a":{"c":"x","d":[3,{"y":null,"z":true}]},"b":1}'
    );
  });

  it("keeps array order", () => {
    expect(canonicalJson([3, 1, 2])).toBe("[3,1,2]");
  });

  it("encodes the same logical proof identically regardless of key order", () => {
    const first = encodeCanonicalBase64({ proof: "0xab", public_values: [1, 2], vk: { k: 1, h: 2 } });
    const second = encodeCanonicalBase64({ vk: { h: 2, k: 1 }, public_values: [1, 2], proof: "0xab" });

    expect(first).toBe(second);
    expect(Buffer.from(first, "base64").toString("utf-8")).toBe(
      '{"proof":"0xab","public_values":[1,2],"vk":{"h":2,"k":1}}'
    );
  });

  it("base64-encodes the canonical text", () => {
    expect(encodeCanonicalBase64({ b: 2, a: 1 })).toBe(Buffer.from('{"a":1,"b":2}').toString("base64"));
  });
});
