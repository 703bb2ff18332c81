import * as os from 'node:os';
import { all, FeatureSet, load, merge, range, saveTo } from '../src';

// 1. Build a feature set: one label per sample, one name per feature
const fs = FeatureSet.from(
  ['cat', 'cat', 'dog', 'dog'],
  ['height', 'weight', 'age'],
  [
    [24.1, 4.2, 3],
    [25.3, 4.8, 5],
    [55.0, 30.1, 4],
    [61.2, 32.5, 7],
  ],
);

// 2. Select: get() copies, view() shares storage with fs
console.log(fs.get(2, 'weight')); // 30.1
console.log(fs.get(all, 'height')); // [24.1, 25.3, 55, 61.2]
const dogs = fs.view(range(2, 4), ['height', 'age']);
console.log(dogs.toString(), dogs.parent === fs); // FeatureSet<float64>[2 × 2] view true

// 3. Merge views of the same root back into one view
const heights = fs.view(all, ['height']);
const ages = fs.view(all, ['age']);
console.log(merge(heights, ages).names.toArray()); // ['height', 'age']

// 4. Persist and read back lazily
const file = saveTo(fs, { directory: os.tmpdir() });
const back = load(file, { mmap: true });
console.log(back.equals(fs)); // true
