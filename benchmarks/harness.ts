/**
 * Benchmark harness: timing, targets and reporting.
 */

export interface Benchmark {
  name: string;
  /** Called once before warmup */
  setup?: () => void;
  fn: () => void;
  /** Number of iterations (default: 1000) */
  iterations?: number;
  /** Average time budget in ms; the run fails if it is exceeded */
  targetMs?: number;
}

export interface BenchmarkSuite {
  name: string;
  benchmarks: Benchmark[];
}

export interface BenchmarkResult {
  name: string;
  iterations: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
  opsPerSec: number;
  targetMs?: number;
  passed: boolean;
}

export function runBenchmark(bench: Benchmark): BenchmarkResult {
  const iterations = bench.iterations ?? 1000;
  bench.setup?.();

  // Warmup (10% of iterations, min 10)
  const warmupCount = Math.max(10, Math.floor(iterations * 0.1));
  for (let i = 0; i < warmupCount; i++) bench.fn();

  let totalMs = 0;
  let minMs = Number.POSITIVE_INFINITY;
  let maxMs = 0;
  for (let i = 0; i < iterations; i++) {
    const start = performance.now();
    bench.fn();
    const elapsed = performance.now() - start;
    totalMs += elapsed;
    minMs = Math.min(minMs, elapsed);
    maxMs = Math.max(maxMs, elapsed);
  }

  const avgMs = totalMs / iterations;
  return {
    name: bench.name,
    iterations,
    avgMs,
    minMs,
    maxMs,
    opsPerSec: 1000 / avgMs,
    targetMs: bench.targetMs,
    passed: bench.targetMs === undefined || avgMs <= bench.targetMs,
  };
}

export function formatResult(result: BenchmarkResult): string {
  const status = result.passed ? "✓" : "✗";
  const target = result.targetMs !== undefined ? ` (target: <${result.targetMs}ms)` : "";
  const avg = result.avgMs < 0.01
    ? `${(result.avgMs * 1000).toFixed(2)}µs`
    : `${result.avgMs.toFixed(3)}ms`;

  return [
    `${status} ${result.name}`,
    `  avg: ${avg}${target}`,
    `  min: ${result.minMs.toFixed(3)}ms, max: ${result.maxMs.toFixed(3)}ms`,
    `  ops/sec: ${result.opsPerSec.toFixed(0).replace(/\B(?=(\d{3})+(?!\d))/g, ",")}`,
  ].join("\n");
}

/** Run every suite; returns the number of failed benchmarks. */
export function runBenchmarks(suites: BenchmarkSuite[]): number {
  let passed = 0;
  let failed = 0;

  for (const suite of suites) {
    console.log(`\n## ${suite.name}\n`);
    for (const bench of suite.benchmarks) {
      try {
        const result = runBenchmark(bench);
        console.log(formatResult(result));
        console.log("");
        if (result.passed) passed++;
        else failed++;
      } catch (error) {
        console.log(`✗ ${bench.name}`);
        console.log(`  ERROR: ${error instanceof Error ? error.message : String(error)}`);
        console.log("");
        failed++;
      }
    }
  }

  console.log("=".repeat(60));
  console.log(`Results: ${passed} passed, ${failed} failed`);
  console.log("=".repeat(60));
  return failed;
}
