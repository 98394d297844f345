/**
 * Small response and path helpers shared by the handlers.
 */

export const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: JSON_HEADERS });
}

/**
 * Path segment after `/api/v1/<collection>/`, e.g. the evaluation id in
 * /api/v1/evaluations/:id/results.
 */
export function resourceId(req: Request, collection: string): string {
  const parts = new URL(req.url).pathname.split('/').filter(Boolean);
  const index = parts.indexOf(collection);
  return decodeURIComponent(parts[index + 1] ?? '');
}
