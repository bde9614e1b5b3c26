import type { ClusterClient } from "../cluster/oc-client.js";

export function formatRouteUrl(host: string): string {
  return `http://${host}`;
}

/**
 * URL of the first route matching `selector`. A route that does not exist yet
 * yields a bare "http://"; callers wait for the route before asking.
 */
export async function lookupWebhookUrl(cluster: ClusterClient, selector: string): Promise<string> {
  const [route] = await cluster.findNames("route", selector);
  return formatRouteUrl(route ? await cluster.routeHost(route) : "");
}

export async function lookupRouteUrl(cluster: ClusterClient, route: string): Promise<string> {
  return formatRouteUrl(await cluster.routeHost(route));
}
