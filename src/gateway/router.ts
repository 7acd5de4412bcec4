import type { InboundRequest, RouteName } from '../types/gateway.types.js';

/**
 * Resolves a request to a route. Rules apply in order; every POST reaches the
 * completion handler and the payload decides between chat and text shapes.
 */
export function resolveRoute(request: Pick<InboundRequest, 'method' | 'path'>): RouteName {
  const method = request.method.toUpperCase();

  if (method === 'GET' && request.path.includes('/models')) return 'list-models';
  if (method === 'OPTIONS') return 'cors-preflight';
  if (method === 'POST') return 'completion';
  return 'not-found';
}
