import { serve } from "@hono/node-server";
import { networkInterfaces } from "node:os";

import { parseEnv } from "./env";
import { createApp } from "./index";
import { checkSubscription, configure, describeSubscription } from "./lib/ztm";

const env = parseEnv(process.env);
const subscription = configure(env.subscription);

const app = createApp({
  config: env.subscription,
  getCurrent: () => subscription.current(),
  getStopInfo: () => subscription.stopInfo(),
  refresh: () => subscription.fetch(),
});

const getLanUrls = (host: string, port: number): string[] => {
  if (host !== "0.0.0.0" && host !== "::") {
    return [`http://${host}:${port}`];
  }

  const urls = new Set<string>();
  const interfaces = networkInterfaces();

  for (const iface of Object.values(interfaces)) {
    for (const addr of iface ?? []) {
      if (addr.internal) {
        continue;
      }

      if (addr.family === "IPv4") {
        urls.add(`http://${addr.address}:${port}`);
      }
    }
  }

  return Array.from(urls).sort();
};

const main = async () => {
  const server = serve({ fetch: app.fetch, hostname: env.host, port: env.port }, (info) => {
    const displayHost = env.host === "0.0.0.0" ? "all interfaces" : env.host;
    console.log(`[api] Listening on ${displayHost}:${info.port}`);
    for (const url of getLanUrls(env.host, info.port)) {
      console.log(`[api] Reachable at ${url}`);
    }
  });

  const stop = () => {
    subscription.shutdown();
    server.close();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  const context = describeSubscription(env.subscription);
  const check = await checkSubscription(env.subscription);
  if (check.ok) {
    console.log(`[api] Subscription verified (${context})`);
  } else {
    console.warn(`[api] Subscription check failed: ${check.reason} (${context})`);
  }

  await subscription.start();
};

main().catch((error: unknown) => {
  console.error("[api] Failed to start", error);
  process.exitCode = 1;
});
