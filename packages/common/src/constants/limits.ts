export const Limits = {
  /** Reconciliation pass interval in ms (5 minutes) */
  CHECK_INTERVAL_MS: 300_000,

  /** Delay before the next full batch after an iteration-level failure (60 seconds) */
  ITERATION_RETRY_DELAY_MS: 60_000,

  /** How long before execution the reminder is due (24 hours) */
  REMINDER_WINDOW_MS: 86_400_000,

  /** Days between scheduling and deletion when no time is given */
  DEFAULT_DELETION_DELAY_DAYS: 2,

  /** Consecutive transient failures before a destructive failure is reported */
  FAILURE_NOTIFY_THRESHOLD: 3,

  /** Timeout for a single collaborator call in ms */
  COLLABORATOR_TIMEOUT_MS: 15_000,

  /** Confirmation token lifetime in ms (1 hour) */
  CONFIRMATION_MAX_AGE_MS: 3_600_000,

  /** Confirmation cleanup cadence in ms (5 minutes) */
  CONFIRMATION_CLEANUP_INTERVAL_MS: 300_000,

  /** Grace period for an in-flight reconciliation cycle at shutdown */
  SHUTDOWN_GRACE_MS: 30_000,

  /** Max events requested per calendar page */
  CALENDAR_PAGE_SIZE: 250,

  /** Max entries kept in the failed notification queue */
  FAILED_NOTIFICATION_QUEUE_SIZE: 1_000,
} as const;
