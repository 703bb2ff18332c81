/**
 * Indexing Benchmark
 *
 * Compares copying selections (`get`) against zero-copy views (`view`), and
 * eager against paged loading of a saved container.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { bench, group, run } from 'mitata';
import { all, configure, createRng, load, merge, randomFeatureSet, saveTo, silentLogger } from '../src';

configure({ logger: silentLogger });

const source = randomFeatureSet(10_000, 200, { labelCount: 10, rng: createRng(1) });
const rows = Array.from({ length: 5_000 }, (_, i) => i * 2);
const names = Array.from({ length: 100 }, (_, j) => j + 1);

const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'featureset-bench-'));
const file = saveTo(source, { directory: dir });

console.log(`\n📊 Indexing Benchmarks (${source.shape[0]} × ${source.shape[1]})\n`);
console.log('='.repeat(60));

group('Row and column selection', () => {
  bench('get (copy)', () => source.get(rows, names).shape[0]);
  bench('view (zero-copy)', () => source.view(rows, names).shape[0]);
});

group('Merging two column halves', () => {
  const left = source.view(all, names.slice(0, 50));
  const right = source.view(all, names.slice(50));
  const leftCopy = left.copy();
  const rightCopy = right.copy();

  bench('views of one root', () => merge(left, right).shape[1]);
  bench('owned feature sets', () => merge(leftCopy, rightCopy).shape[1]);
});

group('Loading', () => {
  bench('eager load + one value', () => load(file).get(9_999, 200));
  bench('paged load + one value', () => load(file, { mmap: true }).get(9_999, 200));
});

await run();

fs.rmSync(dir, { recursive: true, force: true });
console.log('\n✅ Benchmark complete!');
