/**
 * Registry Performance & Memory Benchmark
 *
 * Run: npm run bench
 */

import { Registry } from '../src/core/registry.js';
import { SlotKey, token } from '../src/core/key.js';
import { noopLogger } from '../src/core/logger.js';

function formatMemory(bytes: number): string {
  return (bytes / 1024 / 1024).toFixed(2) + ' MB';
}

function getMemory() {
  const m = process.memoryUsage();
  return { rss: m.rss, heapUsed: m.heapUsed, heapTotal: m.heapTotal, external: m.external };
}

function printMemory(label: string, mem: ReturnType<typeof getMemory>): void {
  console.log(`  ${label}:`);
  console.log(`    RSS:          ${formatMemory(mem.rss)}`);
  console.log(`    Heap Used:    ${formatMemory(mem.heapUsed)}`);
  console.log(`    Heap Total:   ${formatMemory(mem.heapTotal)}`);
  console.log(`    External:     ${formatMemory(mem.external)}`);
}

function report(label: string, iterations: number, elapsed: number): void {
  console.log(
    `  ${label} (${iterations.toLocaleString()}x): ${elapsed.toFixed(1)}ms (${((elapsed / iterations) * 1000000).toFixed(0)}ns/op)`
  );
}

class Database {}
class Cache {}

function benchLookup(): void {
  console.log('\n--- Lookup Benchmark ---');

  const registry = new Registry({ logger: noopLogger });
  const Config = token<{ port: number }>('Config');
  registry.registerValue(Config, { port: 3000 });
  registry.registerValue(Database, new Database());
  registry.registerValue(Database, new Database(), 'replica');

  const iterations = 10_000_000;

  let start = performance.now();
  for (let i = 0; i < iterations; i++) {
    registry.get(Database);
  }
  report('Get eager', iterations, performance.now() - start);

  start = performance.now();
  for (let i = 0; i < iterations; i++) {
    registry.get(Database, 'replica');
  }
  report('Get named', iterations, performance.now() - start);

  start = performance.now();
  for (let i = 0; i < iterations; i++) {
    registry.lookup(Cache);
  }
  report('Miss', iterations, performance.now() - start);
}

function benchLazy(): void {
  console.log('\n--- Lazy Slot Benchmark ---');

  const registry = new Registry({ logger: noopLogger });
  const iterations = 10_000_000;

  const start = performance.now();
  for (let i = 0; i < iterations; i++) {
    registry.lazy(Cache, () => new Cache());
  }
  report('lazy() after first call', iterations, performance.now() - start);
}

async function benchAwaitReady(): Promise<void> {
  console.log('\n--- awaitReady Benchmark ---');

  const registry = new Registry({ logger: noopLogger });
  registry.registerValue(Database, Promise.resolve(new Database()));
  registry.registerLazy(Cache, () => new Cache());
  const selector = [Database, new SlotKey(Cache)];

  const iterations = 1_000_000;
  const start = performance.now();
  for (let i = 0; i < iterations; i++) {
    await registry.awaitReady(selector);
  }
  report('Two settled slots', iterations, performance.now() - start);
}

function benchSlotMemory(): void {
  console.log('\n--- Slot Memory ---');

  const registry = new Registry({ logger: noopLogger });
  const count = 100_000;
  const before = getMemory().heapUsed;
  for (let i = 0; i < count; i++) {
    registry.registerValue(Database, new Database(), `db-${i}`);
  }
  const after = getMemory().heapUsed;

  console.log(`  Slots registered: ${registry.size.toLocaleString()}`);
  console.log(`  Heap per slot:    ~${Math.round((after - before) / count)} bytes`);

  registry.resetAllForTest();
}

async function main(): Promise<void> {
  console.log('================================================');
  console.log('  singleton-slots: Performance Benchmark');
  console.log('================================================');

  const startMem = getMemory();
  printMemory('Startup Memory', startMem);

  benchLookup();
  benchLazy();
  await benchAwaitReady();
  benchSlotMemory();

  // only defined under --expose-gc
  const gc: unknown = Reflect.get(globalThis, 'gc');
  if (typeof gc === 'function') {
    gc();
    await new Promise((r) => setTimeout(r, 100));
  }

  const endMem = getMemory();
  console.log('\n--- Final Memory ---');
  printMemory('After Benchmarks', endMem);

  console.log(`\n  Memory delta: ${formatMemory(endMem.rss - startMem.rss)} RSS`);
  console.log('================================================\n');
}

main().catch(console.error);
