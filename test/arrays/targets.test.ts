import { describe, it } from "node:test";
import assert from "node:assert";
import {
  ArrayTypeError,
  DynamicTarget,
  FixedArrayTarget,
  NullableTarget,
  SequenceTarget,
  array,
  bool,
  bytea,
  fixedArray,
  getTarget,
  int4,
  nullable,
  record,
  text,
} from "../../arrays/index.ts";
import { describeLiteral } from "../../arrays/targets.ts";

describe("getTarget", () => {
  it("resolves scalar type names and aliases", () => {
    assert.strictEqual(getTarget("int4").type, "int4");
    assert.strictEqual(getTarget("INTEGER").type, "int4");
    assert.strictEqual(getTarget("smallint").type, "int2");
    assert.strictEqual(getTarget("bigint").type, "int8");
    assert.strictEqual(getTarget("double precision").type, "float8");
    assert.strictEqual(getTarget("boolean").type, "bool");
    assert.strictEqual(getTarget("varchar").type, "varchar");
    assert.strictEqual(getTarget("uuid").type, "uuid");
  });

  it("resolves dynamic targets", () => {
    assert.ok(getTarget("any") instanceof DynamicTarget);
    assert.ok(getTarget("anyarray") instanceof DynamicTarget);
  });

  it("builds array dimensions outermost first", () => {
    const target = getTarget("int4[3][]");
    assert.ok(target instanceof FixedArrayTarget);
    assert.strictEqual(target.length, 3);
    assert.ok(target.element instanceof SequenceTarget);
    assert.strictEqual(target.type, "int4[3][]");
    assert.strictEqual(target.element.type, "int4[]");
  });

  it("caches targets by normalized name", () => {
    assert.strictEqual(getTarget("text[]"), getTarget(" TEXT[] "));
  });

  it("throws on unknown types", () => {
    assert.throws(() => getTarget("nosuchtype"), /Unknown type: nosuchtype/);
    assert.throws(() => getTarget("int4[x]"), /Unknown type: int4\[x\]/);
  });
});

describe("Target builders", () => {
  it("names composed types", () => {
    assert.strictEqual(array(array(int4())).type, "int4[][]");
    assert.strictEqual(fixedArray(array(text()), 2).type, "text[2][]");
    assert.strictEqual(nullable(int4()).type, "Nullable(int4)");
    assert.strictEqual(array(nullable(int4())).type, "Nullable(int4)[]");
  });

  it("rejects invalid fixed lengths", () => {
    assert.throws(() => fixedArray(int4(), -1), RangeError);
    assert.throws(() => fixedArray(int4(), 1.5), RangeError);
  });

  it("zero-fills fixed arrays", () => {
    assert.deepStrictEqual(fixedArray(int4(), 3).zeroValue(), [0, 0, 0]);
    assert.deepStrictEqual(fixedArray(text(), 2).zeroValue(), ["", ""]);
  });

  it("nullable targets start as null", () => {
    const target = nullable(int4());
    assert.ok(target instanceof NullableTarget);
    assert.strictEqual(target.zeroValue(), null);
  });
});

describe("coerce", () => {
  it("leaves non-nullable scalars untouched on null", () => {
    assert.strictEqual(int4().coerce({ kind: "null" }), undefined);
    assert.strictEqual(text().coerce({ kind: "null" }), undefined);
    assert.strictEqual(bool().coerce({ kind: "null" }), undefined);
  });

  it("stringifies booleans for text", () => {
    assert.deepStrictEqual(text().coerce({ kind: "bool", value: true }), { value: "t" });
    assert.deepStrictEqual(text().coerce({ kind: "bool", value: false }), { value: "f" });
  });

  it("empties bytea on null", () => {
    assert.deepStrictEqual(bytea().coerce({ kind: "null" }), { value: new Uint8Array(0) });
  });

  it("reports the literal kind in type errors", () => {
    const err = bool().coerce({ kind: "bare", text: "yes" });
    assert.ok(err instanceof ArrayTypeError);
    assert.strictEqual(err.message, "cannot decode literal yes into value of type bool");
    const rec = record().coerce({ kind: "quoted", bytes: new Uint8Array(0) });
    assert.ok(rec instanceof ArrayTypeError);
    assert.strictEqual(rec.message, "cannot decode string into value of type record");
  });

  it("describes literals", () => {
    assert.strictEqual(describeLiteral({ kind: "null" }), "null");
    assert.strictEqual(describeLiteral({ kind: "bool", value: true }), "bool");
    assert.strictEqual(describeLiteral({ kind: "bare", text: "12" }), "literal 12");
  });
});
