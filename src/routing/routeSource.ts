// Route sources: where the pipeline gets the current route table from
import { watch, type FSWatcher } from 'fs';
import { basename, dirname } from 'path';
import { loadRouteTable, type RouteTable } from './routeTable';

export interface RouteSource {
  current(): Promise<RouteTable>;
}

// Reads the document on every request: edits apply immediately, at the cost of I/O per request
export class PerRequestRouteSource implements RouteSource {
  constructor(private readonly file: string) {}

  current(): Promise<RouteTable> {
    return loadRouteTable(this.file);
  }
}

// Fixed table, for embedding and tests
export class StaticRouteSource implements RouteSource {
  constructor(private readonly table: RouteTable) {}

  current(): Promise<RouteTable> {
    return Promise.resolve(this.table);
  }
}

const WATCH_DEBOUNCE_MS = 100;

/**
 * Keeps an immutable snapshot of the route table. Readers always see either the
 * old or the new snapshot; a failed reload leaves the old one in place.
 */
export class WatchedRouteSource implements RouteSource {
  private snapshot: RouteTable | undefined;
  private watcher: FSWatcher | undefined;
  private debounce: NodeJS.Timeout | undefined;

  constructor(private readonly file: string) {}

  // Initial load; a ConfigLoadError here is meant to stop startup
  async load(): Promise<RouteTable> {
    this.snapshot = await loadRouteTable(this.file);
    return this.snapshot;
  }

  async reload(): Promise<RouteTable> {
    try {
      const next = await loadRouteTable(this.file);
      this.snapshot = next;
      console.log(`Route table reloaded from ${this.file} (${next.length} routes)`);
      return next;
    } catch (err) {
      console.error(`Route table reload failed, keeping previous table: ${err instanceof Error ? err.message : String(err)}`);
      throw err;
    }
  }

  current(): Promise<RouteTable> {
    return this.snapshot ? Promise.resolve(this.snapshot) : this.load();
  }

  // Watches the directory, not the file: a save that renames a temp file over the
  // document replaces its inode, and a file watcher would stay on the old one
  watch(): void {
    if (this.watcher) return;
    const name = basename(this.file);
    this.watcher = watch(dirname(this.file), (_event, filename) => {
      if (filename !== null && filename !== name) return;
      // Editors emit several events per save; collapse them into one reload
      if (this.debounce) clearTimeout(this.debounce);
      this.debounce = setTimeout(() => {
        this.debounce = undefined;
        // reload() already logged the failure and the previous table stays active
        this.reload().catch(() => undefined);
      }, WATCH_DEBOUNCE_MS);
    });
    this.watcher.on('error', (err: Error) => {
      console.error(`Route document watcher failed for ${this.file}: ${err.message}`);
    });
  }

  close(): void {
    if (this.debounce) clearTimeout(this.debounce);
    this.debounce = undefined;
    this.watcher?.close();
    this.watcher = undefined;
  }
}
