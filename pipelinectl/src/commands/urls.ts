import type { DemoContext } from "../context.js";
import { lookupRouteUrl, lookupWebhookUrl } from "../core/urls.js";
import { EXIT } from "./exit-codes.js";

export async function webhookUrl(ctx: DemoContext): Promise<number> {
  const url = await lookupWebhookUrl(ctx.cluster, ctx.config.triggers.event_listener_selector);
  ctx.reporter.info(`Webhook URL: ${url}`, { url });
  return EXIT.SUCCESS;
}

export async function appUrl(ctx: DemoContext): Promise<number> {
  const url = await lookupRouteUrl(ctx.cluster, ctx.config.app_route);
  ctx.reporter.print("Click following URL to access the application");
  ctx.reporter.print(url, "URL");
  return EXIT.SUCCESS;
}
