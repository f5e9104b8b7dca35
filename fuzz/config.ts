/**
 * Shared configuration for fuzz tests.
 *
 * FUZZ_LEVEL controls test thoroughness:
 *   quick    - minimal iterations (CI/fast feedback)
 *   standard - normal iterations
 *   thorough - more iterations, deeper and wider values
 *
 * Individual overrides:
 *   FUZZ_ITERATIONS - override iteration count
 *   FUZZ_SEED - seed for the value generator (default: random)
 */

export type FuzzLevel = "quick" | "standard" | "thorough";

const FUZZ_LEVELS: readonly FuzzLevel[] = ["quick", "standard", "thorough"];

function parseLevel(val: string | undefined): FuzzLevel {
  if (val === undefined || val === "") return "standard";
  const level = FUZZ_LEVELS.find((l) => l === val);
  if (level === undefined) {
    throw new Error(`Invalid FUZZ_LEVEL: ${val}`);
  }
  return level;
}

export const FUZZ_LEVEL = parseLevel(process.env.FUZZ_LEVEL);

interface FuzzConfig {
  iterations: number;
  maxDepth: number;
  maxWidth: number;
}

const FUZZ_CONFIGS: Record<FuzzLevel, FuzzConfig> = {
  quick: { iterations: 20, maxDepth: 2, maxWidth: 5 },
  standard: { iterations: 200, maxDepth: 3, maxWidth: 8 },
  thorough: { iterations: 2000, maxDepth: 4, maxWidth: 12 },
};

const baseConfig = FUZZ_CONFIGS[FUZZ_LEVEL];

function parseCount(name: string, fallback: number): number {
  const envVal = process.env[name];
  if (!envVal) return fallback;
  const parsed = parseInt(envVal, 10);
  if (isNaN(parsed) || parsed < 0) {
    throw new Error(`Invalid ${name}: ${envVal}`);
  }
  return parsed;
}

export const config = {
  iterations: parseCount("FUZZ_ITERATIONS", baseConfig.iterations),
  maxDepth: baseConfig.maxDepth,
  maxWidth: baseConfig.maxWidth,
  seed: parseCount("FUZZ_SEED", Math.floor(Math.random() * 0x7fffffff)),
};

export interface FuzzErrorContext {
  iteration: number;
  totalIterations: number;
  seed: number;
  literal: string;
}

export function logFuzzError(ctx: FuzzErrorContext, err: unknown): void {
  const lines = [
    ``,
    `${"=".repeat(60)}`,
    `FUZZ TEST FAILURE`,
    `${"=".repeat(60)}`,
    `Iteration:   ${ctx.iteration + 1}/${ctx.totalIterations}`,
    `Seed:        ${ctx.seed}`,
    `Literal:     ${ctx.literal}`,
    `${"-".repeat(60)}`,
  ];

  if (err instanceof Error) {
    lines.push(`Error:       ${err.message}`);
    if (err.stack) {
      lines.push(`Stack:`);
      lines.push(err.stack.split("\n").slice(1).join("\n"));
    }
  } else {
    lines.push(`Error:       ${String(err)}`);
  }

  lines.push(`${"=".repeat(60)}`);
  console.error(lines.join("\n"));
}

export function logConfig(): void {
  console.log(
    `[fuzz] level=${FUZZ_LEVEL}, iterations=${config.iterations}, seed=${config.seed}, maxDepth=${config.maxDepth}`,
  );
}
