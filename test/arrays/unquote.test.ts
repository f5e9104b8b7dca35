import { describe, it } from "node:test";
import assert from "node:assert";
import { unquote, unquoteBytes } from "../../arrays/index.ts";

const encoder = new TextEncoder();
const q = (s: string) => unquote(encoder.encode(s));

describe("unquote", () => {
  it("strips the quotes", () => {
    assert.strictEqual(q('"abc"'), "abc");
    assert.strictEqual(q('""'), "");
  });

  it("returns a view of the input when nothing needs resolving", () => {
    const input = encoder.encode('"plain text"');
    const out = unquoteBytes(input);
    assert.ok(out !== null);
    assert.strictEqual(out.buffer, input.buffer);
    assert.strictEqual(out.byteOffset, 1);
    assert.strictEqual(out.length, 10);
  });

  it("resolves backslash escapes", () => {
    assert.strictEqual(q('"a\\"b"'), 'a"b');
    assert.strictEqual(q('"\\\\"'), "\\");
    assert.strictEqual(q('"\\{\\}\\,"'), "{},");
    assert.strictEqual(q('"\\n"'), "n");
  });

  it("decodes \\u escapes", () => {
    assert.strictEqual(q('"caf\\u00e9"'), "café");
    assert.strictEqual(q('"\\u0041\\u0042"'), "AB");
    assert.strictEqual(q('"\\u000a"'), "\n");
  });

  it("joins surrogate pairs", () => {
    assert.strictEqual(q('"\\ud83d\\ude00"'), "\u{1f600}");
  });

  it("replaces a lone surrogate", () => {
    assert.strictEqual(q('"\\ud83dx"'), "\ufffdx");
    assert.strictEqual(q('"\\ude00"'), "\ufffd");
  });

  it("passes UTF-8 through", () => {
    assert.strictEqual(q('"héllo wörld"'), "héllo wörld");
    assert.strictEqual(q('"\\é"'), "é");
  });

  it("replaces invalid UTF-8", () => {
    assert.strictEqual(unquote(new Uint8Array([0x22, 0x61, 0xff, 0x22])), "a\ufffd");
  });

  it("rejects malformed literals", () => {
    assert.strictEqual(q('"'), null);
    assert.strictEqual(q("abc"), null);
    assert.strictEqual(q('"abc'), null);
    assert.strictEqual(q('"a"b"'), null);
    assert.strictEqual(q('"a\nb"'), null);
    assert.strictEqual(q('"abc\\"'), null);
    assert.strictEqual(q('"\\u12"'), null);
    assert.strictEqual(q('"\\uzzzz"'), null);
  });
});
