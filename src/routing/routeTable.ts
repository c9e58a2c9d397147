// Route document loading: read, validate and compile the JSON route table
import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigLoadError } from '../errors';
import { compilePathPattern } from './routeMatcher';

export const routeSchema = z.object({
  path: z.string().min(1),
  method: z.string().min(1),
  auth: z.boolean(),
  // Name of the environment variable holding the backend hostname, not the hostname itself
  host: z.string(),
  port: z.union([z.number().int().nonnegative(), z.string().min(1)]),
});

export const routeDocumentSchema = z.array(routeSchema);

export type Route = Readonly<z.infer<typeof routeSchema>>;

export interface CompiledRoute {
  readonly route: Route;
  readonly pattern: RegExp;
}

export type RouteTable = readonly CompiledRoute[];

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}

// Compile every pattern once; order is kept because the first match wins
export function buildRouteTable(routes: readonly Route[], source = '<memory>'): RouteTable {
  return Object.freeze(
    routes.map((route, index) => {
      let pattern: RegExp;
      try {
        pattern = compilePathPattern(route.path);
      } catch (err) {
        throw new ConfigLoadError(source, `route ${index} has an invalid path pattern "${route.path}"`, { cause: err });
      }
      return Object.freeze({ route: Object.freeze({ ...route }), pattern });
    }),
  );
}

export function parseRouteDocument(raw: string, source = '<memory>'): RouteTable {
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (err) {
    throw new ConfigLoadError(source, 'document is not valid JSON', { cause: err });
  }

  const parsed = routeDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigLoadError(source, describeIssues(parsed.error), { cause: parsed.error });
  }
  return buildRouteTable(parsed.data, source);
}

export async function loadRouteTable(file: string): Promise<RouteTable> {
  let raw: string;
  try {
    raw = await readFile(file, 'utf8');
  } catch (err) {
    throw new ConfigLoadError(file, err instanceof Error ? err.message : 'file cannot be read', { cause: err });
  }
  return parseRouteDocument(raw, file);
}
