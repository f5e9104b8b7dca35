/**
 * Unit fuzz tests for the array literal encoder/decoder.
 * Generates random value trees from a seed and round-trips them through
 * encodeArrayLiteral and parseArray, then feeds random malformed literals
 * to the decoder to check scanner and decoder stay in step.
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import {
  DecoderPhaseError,
  type DynamicValue,
  type Target,
  array,
  decodeInto,
  dynamic,
  encodeArrayLiteral,
  fixedArray,
  int4,
  int8,
  parseArray,
  text,
} from "../arrays/index.ts";
import { config, logConfig, logFuzzError } from "./config.ts";

logConfig();

// mulberry32
function createRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

describe("Array Literal Unit Fuzz Tests", { timeout: 60000 }, () => {
  const random = createRandom(config.seed);
  const randomInt = (min: number, max: number) => Math.floor(random() * (max - min + 1)) + min;
  const randomFloat = () => {
    const n = (random() - 0.5) * 10 ** randomInt(-5, 20);
    return n === 0 ? 0 : n;
  };
  const randomString = (maxLen = 20) => {
    const len = randomInt(0, maxLen);
    const codePoints = [
      () => randomInt(0x20, 0x7e), // ASCII, including quotes, braces and backslash
      () => randomInt(0x00, 0x1f), // control characters
      () => randomInt(0x00c0, 0x00ff),
      () => randomInt(0x4e00, 0x9fff),
      () => randomInt(0x1f600, 0x1f64f),
    ];
    return Array.from({ length: len }, () => {
      const gen = codePoints[randomInt(0, codePoints.length - 1)];
      return String.fromCodePoint(gen());
    }).join("");
  };
  const keywords = ["NULL", "null", "t", "f", "", " ", "{}", "{1,2}"];

  const randomLeaf = (): DynamicValue => {
    switch (randomInt(0, 5)) {
      case 0:
        return null;
      case 1:
        return random() < 0.5;
      case 2:
        return randomInt(-1000000, 1000000);
      case 3:
        return randomFloat();
      case 4:
        return keywords[randomInt(0, keywords.length - 1)];
      default:
        return randomString();
    }
  };

  const randomTree = (depth: number): DynamicValue[] => {
    const width = randomInt(0, config.maxWidth);
    return Array.from({ length: width }, () =>
      depth < config.maxDepth && random() < 0.3 ? randomTree(depth + 1) : randomLeaf(),
    );
  };

  function roundTrip<T>(iteration: number, literal: string, decode: () => T, expected: T): void {
    try {
      assert.deepStrictEqual(decode(), expected);
    } catch (err) {
      logFuzzError({ iteration, totalIterations: config.iterations, seed: config.seed, literal }, err);
      throw err;
    }
  }

  it("round-trips dynamic value trees", () => {
    for (let i = 0; i < config.iterations; i++) {
      const value: DynamicValue = randomTree(1);
      const literal = encodeArrayLiteral(value);
      roundTrip(i, literal, () => parseArray(literal, dynamic()), value);
    }
  });

  it("round-trips int4 arrays", () => {
    for (let i = 0; i < config.iterations; i++) {
      const value = Array.from({ length: randomInt(0, 200) }, () =>
        randomInt(-2147483648, 2147483647),
      );
      const literal = encodeArrayLiteral(value);
      roundTrip(i, literal, () => parseArray(literal, array(int4())), value);
    }
  });

  it("round-trips int8 arrays", () => {
    for (let i = 0; i < config.iterations; i++) {
      const value = Array.from({ length: randomInt(0, 50) }, () =>
        BigInt(randomInt(-Number.MAX_SAFE_INTEGER, Number.MAX_SAFE_INTEGER)) * BigInt(randomInt(1, 1000)),
      );
      const literal = encodeArrayLiteral(value);
      roundTrip(i, literal, () => parseArray(literal, array(int8())), value);
    }
  });

  it("never loses sync on malformed literals", () => {
    const alphabet = ["{", "}", ",", '"', "\\", " ", "a", "1", "N", "t", "u", "\t"];
    const targets: Target<unknown>[] = [dynamic(), array(text()), array(array(int4())), fixedArray(int4(), 1)];
    for (let i = 0; i < config.iterations * 10; i++) {
      const literal = Array.from(
        { length: randomInt(0, 16) },
        () => alphabet[randomInt(0, alphabet.length - 1)],
      ).join("");
      for (const target of targets) {
        try {
          const err = decodeInto(literal, target, { value: target.zeroValue() });
          assert.ok(!(err instanceof DecoderPhaseError), `${target.type}: ${err?.message}`);
        } catch (err) {
          logFuzzError({ iteration: i, totalIterations: config.iterations * 10, seed: config.seed, literal }, err);
          throw err;
        }
      }
    }
  });

  it("round-trips nested text arrays", () => {
    for (let i = 0; i < config.iterations; i++) {
      const value = Array.from({ length: randomInt(0, 6) }, () =>
        Array.from({ length: randomInt(0, 6) }, () => randomString(30)),
      );
      const literal = encodeArrayLiteral(value);
      roundTrip(i, literal, () => parseArray(literal, array(array(text()))), value);
    }
  });
});
