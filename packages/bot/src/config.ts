import { ConfigurationError, Limits, TimeParser } from '@sundown/common';
import type { ProxmoxConfig } from '@sundown/proxmox';
import type { CalendarConfig, GoogleCredentials } from '@sundown/calendar';

type Env = NodeJS.ProcessEnv;

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;

function requireEnv(env: Env, name: string): string {
  const val = env[name];
  if (!val) throw new ConfigurationError(`Missing required env var: ${name}`);
  return val;
}

function optionalEnv(env: Env, name: string, fallback: string): string {
  return env[name] || fallback;
}

function optionalIntEnv(env: Env, name: string, fallback: number): number {
  const val = env[name];
  if (val === undefined || val === '') return fallback;
  if (!/^\d+$/.test(val.trim())) {
    throw new ConfigurationError(`Env var ${name} must be a non-negative integer, got "${val}"`);
  }
  return parseInt(val, 10);
}

export function loadConfig(env: Env = process.env) {
  const nodeEnv = optionalEnv(env, 'NODE_ENV', 'development');

  const displayTimezone = optionalEnv(env, 'DISPLAY_TIMEZONE', 'UTC');
  if (!TimeParser.isValidTimezone(displayTimezone)) {
    throw new ConfigurationError(`Unknown DISPLAY_TIMEZONE: ${displayTimezone}`);
  }

  const callTimeoutMs = optionalIntEnv(env, 'COLLABORATOR_TIMEOUT_MS', Limits.COLLABORATOR_TIMEOUT_MS);

  return {
    slack: {
      botToken: requireEnv(env, 'SLACK_BOT_TOKEN'),
      appToken: requireEnv(env, 'SLACK_APP_TOKEN'),
      signingSecret: requireEnv(env, 'SLACK_SIGNING_SECRET'),
      broadcastChannel: optionalEnv(env, 'SLACK_BROADCAST_CHANNEL', '#proxmox'),
    },
    proxmox: {
      apiUrl: requireEnv(env, 'PROXMOX_API_URL'),
      tokenId: requireEnv(env, 'PROXMOX_TOKEN_ID'),
      tokenSecret: requireEnv(env, 'PROXMOX_TOKEN_SECRET'),
      node: optionalEnv(env, 'PROXMOX_NODE', 'pve'),
      timeoutMs: callTimeoutMs,
    } satisfies ProxmoxConfig,
    google: {
      clientId: requireEnv(env, 'GOOGLE_CLIENT_ID'),
      clientSecret: requireEnv(env, 'GOOGLE_CLIENT_SECRET'),
      refreshToken: requireEnv(env, 'GOOGLE_REFRESH_TOKEN'),
    } satisfies GoogleCredentials,
    calendar: {
      calendarId: optionalEnv(env, 'GOOGLE_CALENDAR_ID', 'primary'),
      timeoutMs: callTimeoutMs,
    } satisfies CalendarConfig,
    scheduler: {
      checkIntervalMs:
        optionalIntEnv(env, 'CHECK_INTERVAL_MINUTES', Limits.CHECK_INTERVAL_MS / MINUTE_MS) * MINUTE_MS,
      retryDelayMs:
        optionalIntEnv(env, 'ITERATION_RETRY_DELAY_SECONDS', Limits.ITERATION_RETRY_DELAY_MS / 1_000) * 1_000,
      reminderWindowMs:
        optionalIntEnv(env, 'REMINDER_WINDOW_HOURS', Limits.REMINDER_WINDOW_MS / HOUR_MS) * HOUR_MS,
      deletionDelayDays: optionalIntEnv(env, 'DELETION_DELAY_DAYS', Limits.DEFAULT_DELETION_DELAY_DAYS),
      failureThreshold: optionalIntEnv(env, 'FAILURE_NOTIFY_THRESHOLD', Limits.FAILURE_NOTIFY_THRESHOLD),
      callTimeoutMs,
    },
    confirmations: {
      maxAgeMs:
        optionalIntEnv(env, 'CONFIRMATION_MAX_AGE_MINUTES', Limits.CONFIRMATION_MAX_AGE_MS / MINUTE_MS) * MINUTE_MS,
      cleanupIntervalMs:
        optionalIntEnv(
          env,
          'CONFIRMATION_CLEANUP_INTERVAL_MINUTES',
          Limits.CONFIRMATION_CLEANUP_INTERVAL_MS / MINUTE_MS,
        ) * MINUTE_MS,
    },
    server: {
      nodeEnv,
      logLevel: optionalEnv(env, 'LOG_LEVEL', 'info'),
      displayTimezone,
      shutdownGraceMs: optionalIntEnv(env, 'SHUTDOWN_GRACE_MS', Limits.SHUTDOWN_GRACE_MS),
    },
  };
}

export type Config = ReturnType<typeof loadConfig>;
