/**
 * Guildhall — src/commands/health.ts
 * WHAT: /health: uptime, gateway ping, database reachability and scheduler state.
 * WHY: Quick "is it up, and is the reminder loop alive?" without server access.
 * FLOWS:
 *  - collect metrics → embed → reply (public); ephemeral notice on timeout
 * DOCS:
 *  - Client#ws.ping: https://discord.js.org/#/docs/discord.js/main/class/WebSocketManager?scrollTo=ping
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder, SlashCommandBuilder, type ChatInputCommandInteraction } from "discord.js";
import { replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { HEALTH_CHECK_TIMEOUT_MS } from "../lib/constants.js";
import { pingDatabase } from "../lib/dbHealthCheck.js";
import { logger } from "../lib/logger.js";
import { getSchedulerHealth, type SchedulerHealth } from "../lib/schedulerHealth.js";
import { formatUptime } from "../lib/time.js";

/*
 * client.ws.ping is the heartbeat ACK latency to the gateway, not REST latency.
 * It reads -1 until the first heartbeat comes back.
 */

export const data = new SlashCommandBuilder().setName("health").setDescription("Bot health (uptime, latency, schedulers)");

export function formatRelativeTime(timestamp: number | null, now = Date.now()): string {
  if (timestamp === null) return "never";
  const diffSec = Math.max(0, Math.floor((now - timestamp) / 1000));
  if (diffSec < 60) return `${diffSec}s ago`;
  if (diffSec < 3600) return `${Math.floor(diffSec / 60)}m ago`;
  if (diffSec < 86400) return `${Math.floor(diffSec / 3600)}h ago`;
  return `${Math.floor(diffSec / 86400)}d ago`;
}

export function formatSchedulerStatus(health: SchedulerHealth, now = Date.now()): string {
  const status = health.consecutiveFailures === 0 ? "OK" : `WARN (${health.consecutiveFailures} failures)`;
  return `${status} - Last: ${formatRelativeTime(health.lastRunAt, now)}`;
}

export interface HealthMetrics {
  uptimeSec: number;
  pingMs: number;
  dbLatencyMs: number | null;
  schedulers: SchedulerHealth[];
}

export function buildHealthEmbed(metrics: HealthMetrics, now = Date.now()): EmbedBuilder {
  const healthy = metrics.dbLatencyMs !== null && metrics.schedulers.every((s) => s.consecutiveFailures === 0);
  const embed = new EmbedBuilder()
    .setTitle("Health Check")
    .setColor(healthy ? 0x57f287 : 0xfee75c)
    .addFields(
      { name: "Status", value: healthy ? "Healthy" : "Degraded", inline: true },
      { name: "Uptime", value: formatUptime(metrics.uptimeSec), inline: true },
      { name: "WS Ping", value: metrics.pingMs >= 0 ? `${metrics.pingMs}ms` : "n/a", inline: true },
      {
        name: "Database",
        value: metrics.dbLatencyMs === null ? "unreachable" : `OK (${metrics.dbLatencyMs}ms)`,
        inline: true,
      }
    )
    .setTimestamp(now);

  if (metrics.schedulers.length > 0) {
    embed.addFields({
      name: "Schedulers",
      value: metrics.schedulers.map((s) => `**${s.name}**: ${formatSchedulerStatus(s, now)}`).join("\n"),
    });
  }
  return embed;
}

export async function execute(ctx: CommandContext<ChatInputCommandInteraction>): Promise<void> {
  const { interaction } = ctx;

  let timer: NodeJS.Timeout | undefined;
  const timedOut = new Promise<"timeout">((resolve) => {
    timer = setTimeout(() => resolve("timeout"), HEALTH_CHECK_TIMEOUT_MS);
  });

  const check = (async () => {
    const metrics = await withStep(ctx, "collect_metrics", () => ({
      uptimeSec: Math.floor(process.uptime()),
      pingMs: Math.round(interaction.client.ws.ping),
      dbLatencyMs: pingDatabase(),
      schedulers: getSchedulerHealth(),
    }));
    await withStep(ctx, "reply", () => replyOrEdit(interaction, { embeds: [buildHealthEmbed(metrics)] }, false));
    return "done" as const;
  })();

  try {
    const outcome = await Promise.race([check, timedOut]);
    if (outcome === "timeout") {
      logger.warn({ evt: "health_timeout", guildId: interaction.guildId }, "[health] check timed out");
      await replyOrEdit(interaction, {
        content: `⚠️ Health check timed out after ${HEALTH_CHECK_TIMEOUT_MS / 1000} seconds.`,
      });
    }
  } finally {
    clearTimeout(timer);
  }
}
