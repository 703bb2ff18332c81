/**
 * Paged Store - reads a feature matrix from its container file on demand.
 *
 * The matrix payload is split into fixed-size pages. A page is read the first
 * time one of its values is accessed and kept in an LRU cache of
 * `maxCachedPages` pages. The file is opened only while a page is read.
 */

import { getConfig } from '../../core/config';
import type { MatrixStore } from '../../core/matrix';
import { BYTES_PER_ELEMENT, type FeatureKind, type StorageType, storageOver } from '../../core/types';
import { readExactly, withFile } from './file';

export interface PagedStoreOptions {
  /** Page size in bytes, rounded down to whole elements */
  pageSizeBytes: number;
  /** Pages kept in memory */
  maxCachedPages: number;
}

export class PagedStore<F extends FeatureKind> implements MatrixStore<F> {
  readonly kind: F;
  readonly rows: number;
  readonly cols: number;
  readonly lazy = true;
  readonly path: string;

  private readonly _dataOffset: number;
  private readonly _elementsPerPage: number;
  private readonly _maxCachedPages: number;
  /** Insertion order is recency order: first entry is least recently used */
  private readonly _pages: Map<number, StorageType<F>>;

  constructor(
    path: string,
    kind: F,
    rows: number,
    cols: number,
    dataOffset: number,
    options: PagedStoreOptions,
  ) {
    this.path = path;
    this.kind = kind;
    this.rows = rows;
    this.cols = cols;
    this._dataOffset = dataOffset;
    this._elementsPerPage = Math.max(1, Math.floor(options.pageSizeBytes / BYTES_PER_ELEMENT[kind]));
    this._maxCachedPages = Math.max(1, options.maxCachedPages);
    this._pages = new Map();
  }

  /** Number of pages currently held in memory. */
  get cachedPages(): number {
    return this._pages.size;
  }

  /** Values per page. */
  get elementsPerPage(): number {
    return this._elementsPerPage;
  }

  get(row: number, col: number): number {
    const flat = row * this.cols + col;
    const page = this._page(Math.floor(flat / this._elementsPerPage));
    return page[flat % this._elementsPerPage];
  }

  readRow(row: number, col: number, count: number, target: StorageType<F>, offset: number): void {
    let flat = row * this.cols + col;
    let written = 0;
    while (written < count) {
      const pageIndex = Math.floor(flat / this._elementsPerPage);
      const start = flat % this._elementsPerPage;
      const page = this._page(pageIndex);
      const take = Math.min(count - written, page.length - start);
      target.set(page.subarray(start, start + take), offset + written);
      written += take;
      flat += take;
    }
  }

  private _page(index: number): StorageType<F> {
    const cached = this._pages.get(index);
    if (cached) {
      this._pages.delete(index);
      this._pages.set(index, cached);
      return cached;
    }

    const page = this._readPage(index);
    this._pages.set(index, page);
    if (this._pages.size > this._maxCachedPages) {
      const oldest = this._pages.keys().next();
      if (!oldest.done) this._pages.delete(oldest.value);
    }
    return page;
  }

  private _readPage(index: number): StorageType<F> {
    const bytesPerElement = BYTES_PER_ELEMENT[this.kind];
    const first = index * this._elementsPerPage;
    const count = Math.min(this._elementsPerPage, this.rows * this.cols - first);
    const bytes = withFile(this.path, (fd) =>
      readExactly(fd, this.path, this._dataOffset + first * bytesPerElement, count * bytesPerElement),
    );
    getConfig().logger.debug('Paged in feature values', { path: this.path, page: index, values: count });
    return storageOver(this.kind, bytes.buffer, 0, count);
  }
}
