import { mkdtempSync, renameSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigLoadError } from '../src/errors';
import { PerRequestRouteSource, WatchedRouteSource } from '../src/routing/routeSource';

const PING = '[{"path":"/ping","method":"GET","auth":false,"host":"H","port":8080}]';
function documentWith(count: number): string {
  return JSON.stringify(
    Array.from({ length: count }, (_, i) => ({ path: `/r${i}`, method: 'GET', auth: false, host: 'H', port: 8080 + i })),
  );
}

// Polls until the source serves a table of the expected size, or gives up after two seconds
async function waitForRoutes(source: WatchedRouteSource, expected: number): Promise<number> {
  const deadline = Date.now() + 2000;
  let length = (await source.current()).length;
  while (length !== expected && Date.now() < deadline) {
    await new Promise((resolve) => setTimeout(resolve, 25));
    length = (await source.current()).length;
  }
  return length;
}

const PING_AND_PONG =
  '[{"path":"/ping","method":"GET","auth":false,"host":"H","port":8080},{"path":"/pong","method":"GET","auth":false,"host":"H","port":8081}]';

describe('route sources', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'routes-'));
    file = join(dir, 'routes.json');
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  describe('PerRequestRouteSource', () => {
    it('reads the document again on every call', async () => {
      writeFileSync(file, PING);
      const source = new PerRequestRouteSource(file);
      expect(await source.current()).toHaveLength(1);

      writeFileSync(file, PING_AND_PONG);
      expect(await source.current()).toHaveLength(2);
    });

    it('propagates load failures to the caller', async () => {
      writeFileSync(file, 'not json');
      await expect(new PerRequestRouteSource(file).current()).rejects.toBeInstanceOf(ConfigLoadError);
    });
  });

  describe('WatchedRouteSource', () => {
    it('serves the snapshot until reloaded', async () => {
      writeFileSync(file, PING);
      const source = new WatchedRouteSource(file);
      await source.load();

      writeFileSync(file, PING_AND_PONG);
      expect(await source.current()).toHaveLength(1);

      await source.reload();
      expect(await source.current()).toHaveLength(2);
    });

    it('keeps the previous snapshot when a reload fails', async () => {
      writeFileSync(file, PING);
      const source = new WatchedRouteSource(file);
      const initial = await source.load();

      writeFileSync(file, '[{"path":');
      await expect(source.reload()).rejects.toBeInstanceOf(ConfigLoadError);
      expect(await source.current()).toBe(initial);
    });

    it('fails the initial load when the document is missing', async () => {
      await expect(new WatchedRouteSource(file).load()).rejects.toBeInstanceOf(ConfigLoadError);
    });

    it('keeps reloading after the document is replaced by rename, and after in-place writes', async () => {
      writeFileSync(file, documentWith(1));
      const source = new WatchedRouteSource(file);
      await source.load();
      source.watch();

      try {
        const replace = (count: number) => {
          const temp = join(dir, `routes.json.${count}.tmp`);
          writeFileSync(temp, documentWith(count));
          renameSync(temp, file);
        };

        replace(2);
        expect(await waitForRoutes(source, 2)).toBe(2);

        replace(3);
        expect(await waitForRoutes(source, 3)).toBe(3);

        writeFileSync(file, documentWith(4));
        expect(await waitForRoutes(source, 4)).toBe(4);
      } finally {
        source.close();
      }
    });

    it('ignores changes to other files in the same directory', async () => {
      writeFileSync(file, documentWith(1));
      const source = new WatchedRouteSource(file);
      await source.load();
      source.watch();

      try {
        writeFileSync(join(dir, 'other.json'), documentWith(5));
        await new Promise((resolve) => setTimeout(resolve, 300));
        expect(console.log).not.toHaveBeenCalled();
      } finally {
        source.close();
      }
    });

    it('loads lazily when current() is called before load()', async () => {
      writeFileSync(file, PING);
      expect(await new WatchedRouteSource(file).current()).toHaveLength(1);
    });
  });
});
