/**
 * Benchmark runner.
 *
 * Run with: npm run bench
 */

import { editorBenchmarks } from "./editor.bench.ts";
import { type BenchmarkSuite, runBenchmarks } from "./harness.ts";
import { ropeBenchmarks } from "./rope.bench.ts";

const suites: BenchmarkSuite[] = [ropeBenchmarks, editorBenchmarks];

console.log("=".repeat(60));
console.log("hexmodal Performance Benchmarks");
console.log("=".repeat(60));

if (runBenchmarks(suites) > 0) process.exitCode = 1;
