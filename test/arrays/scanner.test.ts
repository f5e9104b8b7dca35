import { describe, it } from "node:test";
import assert from "node:assert";
import { ArraySyntaxError, LiteralReader, Op, Scanner, ScannerMisuseError } from "../../arrays/index.ts";

const encoder = new TextEncoder();

// Every step() result, then the endOfInput() result, stopping at the first Error.
function scanAll(input: string): Op[] {
  const scanner = new Scanner();
  scanner.reset();
  const ops: Op[] = [];
  for (const c of encoder.encode(input)) {
    const op = scanner.step(c);
    ops.push(op);
    if (op === Op.Error) return ops;
  }
  ops.push(scanner.endOfInput());
  return ops;
}

function scanError(input: string): ArraySyntaxError | null {
  const scanner = new Scanner();
  scanner.reset();
  for (const c of encoder.encode(input)) {
    if (scanner.step(c) === Op.Error) return scanner.error;
  }
  scanner.endOfInput();
  return scanner.error;
}

describe("Scanner", () => {
  it("reports array and literal events", () => {
    assert.deepStrictEqual(scanAll('{1,"a"}'), [
      Op.BeginArray,
      Op.BeginLiteral,
      Op.ArrayValue,
      Op.BeginLiteral,
      Op.Continue,
      Op.Continue,
      Op.EndArray,
      Op.End,
    ]);
  });

  it("reports an empty array", () => {
    assert.deepStrictEqual(scanAll("{}"), [Op.BeginArray, Op.EndArray, Op.End]);
  });

  it("skips spaces outside literals", () => {
    assert.deepStrictEqual(scanAll(" { } "), [
      Op.SkipSpace,
      Op.BeginArray,
      Op.SkipSpace,
      Op.EndArray,
      Op.End,
      Op.End,
    ]);
  });

  it("ends a top-level bare literal at end of input", () => {
    assert.deepStrictEqual(scanAll("12"), [Op.BeginLiteral, Op.Continue, Op.End]);
  });

  it("ends a top-level bare literal at a space", () => {
    assert.deepStrictEqual(scanAll("12 "), [Op.BeginLiteral, Op.Continue, Op.End, Op.End]);
  });

  it("keeps spaces inside bare array elements", () => {
    assert.deepStrictEqual(scanAll("{a b}"), [
      Op.BeginArray,
      Op.BeginLiteral,
      Op.Continue,
      Op.Continue,
      Op.EndArray,
      Op.End,
    ]);
  });

  it("ends a top-level quoted literal at end of input", () => {
    assert.deepStrictEqual(scanAll('"a\\"b"'), [
      Op.BeginLiteral,
      Op.Continue,
      Op.Continue,
      Op.Continue,
      Op.Continue,
      Op.Continue,
      Op.End,
    ]);
  });

  it("tracks nesting depth", () => {
    const scanner = new Scanner();
    scanner.reset();
    for (const c of encoder.encode("{{")) scanner.step(c);
    assert.strictEqual(scanner.depth, 2);
    scanner.step(0x7d);
    assert.strictEqual(scanner.depth, 1);
  });

  it("rejects trailing characters after the top-level value", () => {
    const err = scanError("{1}x");
    assert.ok(err instanceof ArraySyntaxError);
    assert.strictEqual(err.message, "invalid character 'x' after top-level value");
    assert.strictEqual(err.offset, 4);
    assert.strictEqual(err.char, 0x78);
  });

  it("rejects control characters in quoted literals", () => {
    const err = scanError('{"a\n');
    assert.ok(err instanceof ArraySyntaxError);
    assert.strictEqual(err.message, "invalid character '\\x0a' in string literal");
    assert.strictEqual(err.offset, 4);
    assert.strictEqual(err.context, "in string literal");
  });

  it("rejects a delimiter where a value should begin", () => {
    const err = scanError("{,}");
    assert.ok(err instanceof ArraySyntaxError);
    assert.strictEqual(err.message, "invalid character ',' looking for beginning of value");
    assert.strictEqual(err.offset, 2);
  });

  it("rejects a missing element after a comma", () => {
    const err = scanError("{1,}");
    assert.ok(err instanceof ArraySyntaxError);
    assert.strictEqual(err.message, "invalid character '}' looking for beginning of value");
    assert.strictEqual(err.offset, 4);
  });

  it("rejects a garbage byte after an array element", () => {
    const err = scanError('{"a"x}');
    assert.ok(err instanceof ArraySyntaxError);
    assert.strictEqual(err.message, "invalid character 'x' after array element");
    assert.strictEqual(err.offset, 5);
  });

  it("reports unexpected end of input", () => {
    for (const input of ["", "{", "{1", '{"a', "{{1}"]) {
      const err = scanError(input);
      assert.ok(err instanceof ArraySyntaxError, input);
      assert.strictEqual(err.message, "unexpected end of input");
      assert.strictEqual(err.char, null);
      assert.strictEqual(err.offset, encoder.encode(input).length);
    }
  });

  it("keeps returning Error after an error", () => {
    const scanner = new Scanner();
    scanner.reset();
    assert.strictEqual(scanner.step(0x01), Op.Error);
    assert.strictEqual(scanner.step(0x7b), Op.Error);
    assert.strictEqual(scanner.endOfInput(), Op.Error);
  });

  it("replays an undone opcode without counting the byte again", () => {
    const scanner = new Scanner();
    scanner.reset();
    assert.strictEqual(scanner.step(0x7b), Op.BeginArray);
    scanner.undo(Op.BeginArray);
    assert.strictEqual(scanner.step(0x7b), Op.BeginArray);
    assert.strictEqual(scanner.bytes, 1);
    assert.strictEqual(scanner.step(0x31), Op.BeginLiteral);
    assert.strictEqual(scanner.bytes, 2);
  });

  it("throws on a second pending undo", () => {
    const scanner = new Scanner();
    scanner.reset();
    scanner.step(0x7b);
    scanner.undo(Op.BeginArray);
    assert.throws(() => scanner.undo(Op.BeginArray), ScannerMisuseError);
  });

  it("resets to a fresh state", () => {
    const scanner = new Scanner();
    scanner.reset();
    scanner.step(0x01);
    scanner.reset();
    assert.strictEqual(scanner.error, null);
    assert.strictEqual(scanner.bytes, 0);
    assert.strictEqual(scanner.step(0x7b), Op.BeginArray);
  });
});

describe("LiteralReader", () => {
  it("marks end of input with length + 1", () => {
    const reader = new LiteralReader(encoder.encode("{}"));
    assert.strictEqual(reader.scanWhile(Op.SkipSpace), Op.BeginArray);
    assert.strictEqual(reader.scanWhile(Op.SkipSpace), Op.EndArray);
    assert.strictEqual(reader.atEnd, true);
    assert.strictEqual(reader.next(), Op.End);
    assert.strictEqual(reader.offset, 3);
  });

  it("unread puts the byte back", () => {
    const reader = new LiteralReader(encoder.encode("{1}"));
    reader.next();
    const op = reader.next();
    assert.strictEqual(op, Op.BeginLiteral);
    reader.unread(op);
    assert.strictEqual(reader.offset, 1);
    assert.strictEqual(reader.next(), Op.BeginLiteral);
    assert.strictEqual(reader.offset, 2);
  });

  it("throws on a second pending unread", () => {
    const reader = new LiteralReader(encoder.encode("{1}"));
    const op = reader.next();
    reader.unread(op);
    assert.throws(() => reader.unread(op), ScannerMisuseError);
  });
});
