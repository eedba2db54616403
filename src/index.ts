/**
 * Guildhall — src/index.ts
 * WHAT: Main process entrypoint. Boots the Discord client, routes interactions, wires gateway events.
 * WHY: Startup order and the hot path in one place.
 * FLOWS:
 *  - main(): schema → DB health → settings → REST command registration → login
 *  - Ready: invite snapshots → rules-channel start buttons → reminder scheduler → dashboard API → shutdown hooks
 *  - Interaction: slash → wrapped command; faq:list:* / onb:* components and modals → feature handlers
 *  - Events: messageCreate → embed watcher; guildMemberAdd → invite attribution
 * DOCS:
 *  - discord.js v14 (interactions): https://discord.js.org/#/docs/discord.js/main/class/Interaction
 *  - Gateway intents: https://discord.com/developers/docs/topics/gateway#gateway-intents
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { initializeSentry, addBreadcrumb, setUser, setTag, captureException, flushSentry } from "./lib/sentry.js";
import { SHUTDOWN_FLUSH_TIMEOUT_MS, UNCAUGHT_EXCEPTION_EXIT_DELAY_MS } from "./lib/constants.js";
initializeSentry();

import type http from "node:http";
import {
  Client,
  Collection,
  Events,
  GatewayIntentBits,
  MessageFlags,
  Options,
  type AutocompleteInteraction,
  type ChatInputCommandInteraction,
  type Interaction,
} from "discord.js";
import { logger } from "./lib/logger.js";
import { errorCode } from "./lib/errors.js";
import { env, splitList } from "./lib/env.js";
import { wrapEvent } from "./lib/eventWrap.js";
import { armWatchdog, wrapCommand } from "./lib/cmdWrap.js";
import { newTraceId, runWithCtx, type InteractionKind } from "./lib/reqctx.js";
import { requireHealthyDatabase } from "./lib/dbHealthCheck.js";
import { closeDatabase } from "./db/db.js";
import { ensureAllSchemas } from "./db/ensure.js";
import { COMMAND_MODULES, type CommandModule } from "./commands/registry.js";
import { registerCommands } from "./commands/sync.js";
import { handleFaqListButton } from "./commands/faq.js";
import { FAQ_LIST_RE } from "./features/faq/embeds.js";
import { settings } from "./features/settings/index.js";
import {
  ensureStartMessage,
  handleOnboardingComponent,
  handleOnboardingModal,
} from "./features/onboarding/handlers.js";
import { ONBOARDING_ID_RE } from "./features/onboarding/ui.js";
import { handleAnnouncementMessage } from "./features/reminders/embedWatcher.js";
import { forgetGuildInvites, handleMemberJoin, loadGuildInvites, rememberInvite } from "./features/invites/tracker.js";
import { startReminderScheduler, stopReminderScheduler } from "./scheduler/reminderScheduler.js";
import { startApiServer, stopApiServer } from "./web/apiServer.js";

// ===== Global Error Handlers =====
// DOCS: https://nodejs.org/api/process.html#event-uncaughtexception

process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
  captureException(error, { context: "unhandledRejection" });
  // Don't exit - discord.js recovers from most rejections
});

process.on("uncaughtException", (error, origin) => {
  logger.error({ evt: "uncaught_exception", err: error, origin }, "[process] Uncaught exception");
  captureException(error, { context: "uncaughtException", origin });
  // Give Sentry time to flush, then exit
  setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

export const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.MessageContent, // embed watcher reads announcement embeds
    GatewayIntentBits.GuildMembers, // guildMemberAdd for invite attribution
    GatewayIntentBits.GuildInvites, // inviteCreate keeps the invite snapshot fresh
  ],
  // See: https://discordjs.guide/popular-topics/caching.html#limiting-cache-size
  makeCache: Options.cacheWithLimits({
    ...Options.DefaultMakeCacheSettings,
    MessageManager: 100,
    GuildMemberManager: 500, // role checks and the completion role
    UserManager: 500,
    PresenceManager: 0,
    ReactionManager: 0,
    ReactionUserManager: 0,
    GuildStickerManager: 0,
    GuildScheduledEventManager: 0,
    StageInstanceManager: 0,
    VoiceStateManager: 0,
  }),
});

const commands = new Collection<string, (interaction: ChatInputCommandInteraction) => Promise<void>>();
const autocompleters = new Collection<string, NonNullable<CommandModule["autocomplete"]>>();
for (const mod of COMMAND_MODULES) {
  commands.set(mod.data.name, wrapCommand(mod.data.name, mod.execute));
  if (mod.autocomplete) autocompleters.set(mod.data.name, mod.autocomplete);
}

const faqListButton = wrapCommand("faq:list", handleFaqListButton);
const onboardingComponent = wrapCommand("onboarding:component", handleOnboardingComponent);
const onboardingModal = wrapCommand("onboarding:modal", handleOnboardingModal);

let apiServer: http.Server | null = null;

function interactionKind(interaction: Interaction): InteractionKind | null {
  if (interaction.isChatInputCommand()) return "slash";
  if (interaction.isButton()) return "button";
  if (interaction.isStringSelectMenu()) return "select";
  if (interaction.isModalSubmit()) return "modal";
  return null;
}

async function runAutocomplete(interaction: AutocompleteInteraction): Promise<void> {
  const handler = autocompleters.get(interaction.commandName);
  if (!handler) return;
  try {
    await handler(interaction);
  } catch (err) {
    // 10062 when the user typed faster than we answered; nothing to show them anyway
    logger.debug({ err, cmd: interaction.commandName }, "[autocomplete] failed");
  }
}

/**
 * Route one interaction. Returns false when nothing claimed it.
 */
async function dispatch(interaction: Interaction): Promise<boolean> {
  if (interaction.isChatInputCommand()) {
    const executor = commands.get(interaction.commandName);
    if (!executor) {
      addBreadcrumb({
        message: `Unknown command attempted: ${interaction.commandName}`,
        category: "command",
        level: "warning",
      });
      // respond fast or Discord returns 10062 (3s SLA)
      await interaction
        .reply({ content: "Unknown command.", flags: MessageFlags.Ephemeral })
        .catch((err: unknown) => logger.warn({ err }, "Failed to reply with unknown command message"));
      return true;
    }
    await executor(interaction);
    return true;
  }

  if (interaction.isButton()) {
    if (FAQ_LIST_RE.test(interaction.customId)) {
      await faqListButton(interaction);
      return true;
    }
    if (ONBOARDING_ID_RE.test(interaction.customId)) {
      await onboardingComponent(interaction);
      return true;
    }
    return false;
  }

  if (interaction.isStringSelectMenu()) {
    if (ONBOARDING_ID_RE.test(interaction.customId)) {
      await onboardingComponent(interaction);
      return true;
    }
    return false;
  }

  if (interaction.isModalSubmit()) {
    if (ONBOARDING_ID_RE.test(interaction.customId)) {
      await onboardingModal(interaction);
      return true;
    }
    return false;
  }

  return false;
}

client.on(
  Events.InteractionCreate,
  wrapEvent("interactionCreate", async (interaction: Interaction) => {
    if (interaction.isAutocomplete()) {
      await runAutocomplete(interaction);
      return;
    }

    const kind = interactionKind(interaction);
    if (!kind) return;

    const traceId = newTraceId();
    const cmdId = interaction.isChatInputCommand()
      ? interaction.commandName
      : "customId" in interaction
        ? interaction.customId
        : "unknown";

    await runWithCtx(
      {
        traceId,
        kind,
        cmd: cmdId,
        userId: interaction.user.id,
        guildId: interaction.guildId ?? null,
        channelId: interaction.channelId ?? null,
      },
      async () => {
        setUser({ id: interaction.user.id, username: interaction.user.username });
        const startedAt = Date.now();
        logger.info(
          { evt: "ix_enter", traceId, kind, cmd: cmdId, userId: interaction.user.id, guildId: interaction.guildId },
          "interaction enter"
        );

        const cancelWatchdog = armWatchdog(interaction);
        try {
          const handled = await dispatch(interaction);
          if (!handled) {
            logger.warn({ evt: "ix_unrouted", kind, id: cmdId, traceId }, "no route for interaction");
            return;
          }
          logger.info({ evt: "ix_ok", kind, id: cmdId, ms: Date.now() - startedAt, traceId }, "interaction ok");
        } finally {
          cancelWatchdog();
        }
      }
    );
  })
);

client.on(
  Events.MessageCreate,
  wrapEvent("messageCreate", async (message) => {
    if (!message.inGuild() || message.embeds.length === 0) return;
    await handleAnnouncementMessage(message, env.BOT_TIMEZONE);
  })
);

client.on(
  Events.GuildMemberAdd,
  wrapEvent("guildMemberAdd", async (member) => {
    await handleMemberJoin(member);
  })
);

client.on(
  Events.InviteCreate,
  wrapEvent("inviteCreate", (invite) => {
    if (invite.guild) rememberInvite(invite.guild.id, invite);
  })
);

client.on(
  Events.GuildCreate,
  wrapEvent("guildCreate", async (guild) => {
    logger.info({ guildId: guild.id, name: guild.name }, "[guilds] joined guild");
    await loadGuildInvites(guild);
  })
);

client.on(
  Events.GuildDelete,
  wrapEvent("guildDelete", (guild) => {
    logger.info({ guildId: guild.id }, "[guilds] left guild");
    forgetGuildInvites(guild.id);
  })
);

// ===== Coordinated Graceful Shutdown =====
// ORDER: 1) stop scheduler, 2) close API, 3) destroy client, 4) close DB, 5) flush Sentry
let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.warn({ signal }, "[shutdown] Already shutting down, ignoring");
    return;
  }
  isShuttingDown = true;
  logger.info({ signal }, "[shutdown] Graceful shutdown initiated");

  stopReminderScheduler();

  if (apiServer) {
    try {
      await stopApiServer(apiServer);
      logger.debug("[shutdown] API server closed");
    } catch (err) {
      logger.warn({ err }, "[shutdown] API server close failed (non-fatal)");
    }
  }

  client.removeAllListeners();
  await client.destroy();
  logger.debug("[shutdown] Discord client destroyed");

  closeDatabase();
  await flushSentry(SHUTDOWN_FLUSH_TIMEOUT_MS);

  logger.info("[shutdown] Graceful shutdown complete");
  process.exit(0);
}

client.once(Events.ClientReady, async (ready) => {
  logger.info({ tag: ready.user.tag, id: ready.user.id, guilds: ready.guilds.cache.size }, "Bot ready");
  setTag("bot_id", ready.user.id);
  addBreadcrumb({ message: "Bot successfully connected to Discord", category: "bot", level: "info" });

  let invites = 0;
  for (const guild of ready.guilds.cache.values()) {
    invites += await loadGuildInvites(guild);
  }
  logger.info({ guilds: ready.guilds.cache.size, invites }, "[invites] snapshots loaded");

  for (const guild of ready.guilds.cache.values()) {
    try {
      await ensureStartMessage(ready, guild.id, guild.name);
    } catch (err) {
      // 50001/50013 when the bot can't read or post in the rules channel
      logger.warn({ err, guildId: guild.id, code: errorCode(err) }, "[onboarding] start button check failed");
    }
  }

  startReminderScheduler(ready, env.BOT_TIMEZONE);

  if (env.API_ENABLED) {
    try {
      apiServer = await startApiServer({
        client: ready,
        host: env.API_HOST,
        port: env.API_PORT,
        apiKey: env.API_KEY,
        corsOrigins: splitList(env.API_CORS_ORIGINS),
      });
    } catch (err) {
      logger.error({ err, port: env.API_PORT }, "[startup] dashboard API failed to start - continuing without it");
    }
  }

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
});

async function main(): Promise<void> {
  ensureAllSchemas();
  requireHealthyDatabase();
  settings.load();

  if (!env.GUILD_ID) {
    logger.warn("[startup] GUILD_ID not set - commands will register globally");
  }
  await registerCommands();

  await client.login(env.DISCORD_TOKEN);
}

// Only start the bot outside the test runner
if (!process.env.VITEST_WORKER_ID) {
  main().catch((err: unknown) => {
    logger.error({ err }, "Fatal startup error");
    process.exit(1);
  });
}
