// Route matching: first route whose path pattern and method both match wins
import type { CompiledRoute, RouteTable } from './routeTable';

const ID_PLACEHOLDER = '{id}';
const ID_WILDCARD = '\\w+';

// The pattern is anchored at the end only, so `/users/{id}` also matches `/api/v2/users/42`.
// Characters other than the placeholder are kept as regex source.
export function compilePathPattern(pattern: string): RegExp {
  return new RegExp(`${pattern.split(ID_PLACEHOLDER).join(ID_WILDCARD)}$`);
}

export function matchRoute(table: RouteTable, method: string, path: string): CompiledRoute | undefined {
  return table.find(({ route, pattern }) => pattern.test(path) && route.method === method);
}
