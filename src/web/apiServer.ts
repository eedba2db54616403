/**
 * Guildhall — src/web/apiServer.ts
 * WHAT: Small read-only JSON API for a dashboard: health, status, top commands, per-guild metrics.
 * WHY: Operators want numbers without opening Discord; everything here is a SELECT.
 * FLOWS:
 *  - OPTIONS → 204 with CORS headers
 *  - non-GET → 405
 *  - /api/health is open; every other /api/* route needs API_KEY when one is set
 *  - unknown paths → 404 JSON
 * DOCS:
 *  - node:http: https://nodejs.org/api/http.html
 *
 * ENDPOINTS:
 *  GET /api/health
 *  GET /api/status
 *  GET /api/top-commands?guild=<id>&limit=<1..50>
 *  GET /api/guilds/:id/metrics
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import http from "node:http";
import { logger } from "../lib/logger.js";
import { secureCompare } from "../lib/secureCompare.js";
import { getSchedulerHealth } from "../lib/schedulerHealth.js";
import { commandTotals, topCommands } from "../features/audit/store.js";
import { faqCounts } from "../features/faq/store.js";
import { inviteTotals } from "../features/invites/store.js";
import { countCompletions } from "../features/onboarding/store.js";
import { countReminders } from "../features/reminders/store.js";
import { countTicketsByStatus } from "../features/tickets/store.js";

/** The parts of the discord.js Client the status route reads. */
export interface StatusSource {
  isReady(): boolean;
  ws: { ping: number };
  guilds: { cache: { size: number } };
}

export interface ApiServerOptions {
  client: StatusSource;
  apiKey?: string;
  corsOrigins?: readonly string[];
  /** Process start, epoch ms; defaults to now */
  startedAtMs?: number;
}

type JsonBody = Record<string, unknown>;

const GUILD_METRICS_RE = /^\/api\/guilds\/(\d{1,25})\/metrics$/;
const DEFAULT_TOP_LIMIT = 10;
const MAX_TOP_LIMIT = 50;

function sendJson(res: http.ServerResponse, status: number, body: JsonBody): void {
  res.writeHead(status, { "Content-Type": "application/json; charset=utf-8" });
  res.end(JSON.stringify(body));
}

function applyCors(req: http.IncomingMessage, res: http.ServerResponse, origins: readonly string[]): void {
  const origin = req.headers.origin;
  if (origins.includes("*")) {
    res.setHeader("Access-Control-Allow-Origin", "*");
  } else if (origin && origins.includes(origin)) {
    res.setHeader("Access-Control-Allow-Origin", origin);
    res.setHeader("Vary", "Origin");
  }
  res.setHeader("Access-Control-Allow-Methods", "GET, OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Authorization, X-API-Key, Content-Type");
  res.setHeader("Cache-Control", "no-cache, max-age=0");
}

/**
 * Key from `x-api-key`, or `Authorization: Bearer <key>`.
 */
export function presentedKey(req: http.IncomingMessage): string | null {
  const header = req.headers["x-api-key"];
  if (typeof header === "string" && header.length > 0) return header;
  const auth = req.headers.authorization;
  const match = auth?.match(/^Bearer\s+(.+)$/i);
  return match ? match[1].trim() : null;
}

/**
 * `limit` query value clamped to 1..50; anything unparseable falls back to 10.
 */
export function parseLimit(raw: string | null): number {
  if (raw === null || !/^\d+$/.test(raw)) return DEFAULT_TOP_LIMIT;
  return Math.min(Math.max(Number(raw), 1), MAX_TOP_LIMIT);
}

export function guildMetrics(guildId: string): JsonBody {
  const faq = faqCounts(guildId);
  return {
    guildId,
    tickets: countTicketsByStatus(guildId),
    reminders: countReminders(guildId),
    onboarding: { completions: countCompletions(guildId) },
    invites: inviteTotals(guildId),
    faq: { entries: faq.entries, searches: faq.searches, unanswered: faq.unanswered },
    commands: commandTotals(guildId),
  };
}

export function createApiServer(opts: ApiServerOptions): http.Server {
  const startedAtMs = opts.startedAtMs ?? Date.now();
  const corsOrigins = opts.corsOrigins ?? [];
  const uptimeSeconds = () => Math.floor((Date.now() - startedAtMs) / 1000);

  const route = (req: http.IncomingMessage, res: http.ServerResponse): void => {
    applyCors(req, res, corsOrigins);

    if (req.method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }
    if (req.method !== "GET") {
      sendJson(res, 405, { error: "Method not allowed" });
      return;
    }

    const url = new URL(req.url ?? "/", "http://localhost");
    const path = url.pathname.replace(/\/+$/, "") || "/";

    if (path === "/api/health") {
      sendJson(res, 200, { ok: true, uptimeSeconds: uptimeSeconds() });
      return;
    }

    if (opts.apiKey && path.startsWith("/api/")) {
      const key = presentedKey(req);
      if (key === null || !secureCompare(key, opts.apiKey)) {
        sendJson(res, 401, { error: "Unauthorized" });
        return;
      }
    }

    if (path === "/api/status") {
      const seconds = uptimeSeconds();
      sendJson(res, 200, {
        online: opts.client.isReady(),
        latency: Math.round(opts.client.ws.ping),
        uptime: `${Math.floor(seconds / 60)} min`,
        uptimeSeconds: seconds,
        guilds: opts.client.guilds.cache.size,
        schedulers: getSchedulerHealth(),
      });
      return;
    }

    if (path === "/api/top-commands") {
      const guild = url.searchParams.get("guild") || undefined;
      const commands = topCommands(parseLimit(url.searchParams.get("limit")), guild);
      sendJson(res, 200, { commands });
      return;
    }

    const metrics = GUILD_METRICS_RE.exec(path);
    if (metrics) {
      sendJson(res, 200, guildMetrics(metrics[1]));
      return;
    }

    sendJson(res, 404, { error: "Not found" });
  };

  return http.createServer((req, res) => {
    try {
      route(req, res);
    } catch (err) {
      logger.error({ err, evt: "api_error", url: req.url }, "[api] request failed");
      if (!res.headersSent) sendJson(res, 500, { error: "Internal error" });
      else res.end();
    }
  });
}

/**
 * Create and listen. Resolves once bound (port 0 picks a free port; read it from address()).
 */
export async function startApiServer(
  opts: ApiServerOptions & { host: string; port: number }
): Promise<http.Server> {
  const server = createApiServer(opts);
  server.on("error", (err) => {
    logger.error({ err, host: opts.host, port: opts.port }, "[api] server error");
  });
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(opts.port, opts.host, () => {
      server.off("error", reject);
      resolve();
    });
  });
  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : opts.port;
  logger.info({ host: opts.host, port, auth: Boolean(opts.apiKey) }, "[api] dashboard API listening");
  return server;
}

export async function stopApiServer(server: http.Server): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
