/**
 * Guildhall — src/lib/constants.ts
 * WHAT: Shared timeouts and message options.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { MessageMentionOptions } from "discord.js";

/**
 * Suppresses all @mentions. Use for log posts and anything echoing user text.
 */
export const SAFE_ALLOWED_MENTIONS: MessageMentionOptions = { parse: [] };

/** /health gives up and says so after this long */
export const HEALTH_CHECK_TIMEOUT_MS = 5000;

/** Grace period before exit on uncaught exception (for Sentry flush) */
export const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;

/** How long shutdown waits for the Sentry queue */
export const SHUTDOWN_FLUSH_TIMEOUT_MS = 2000;
