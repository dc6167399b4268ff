/**
 * Server URL the agent registers with: the SSE endpoint plus agentId and
 * agentDescription query parameters. Existing query parameters are kept.
 */
export function buildCoralServerUrl(baseUrl: string, agentId: string, description: string): string {
  const url = new URL(baseUrl);
  url.searchParams.set('agentId', agentId);
  url.searchParams.set('agentDescription', description);
  return url.toString();
}
