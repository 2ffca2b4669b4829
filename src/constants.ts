// Shared constants for the step tracker bot.

// Discord returns at most 100 messages per page
export const MESSAGE_FETCH_LIMIT = 100;

// Hash tag that marks a message as a step report (compared lowercase)
export const REPORT_TAG = "отчет";

export const DISCORD_API_BASE = "https://discord.com/api/v10";

// Rate limit backoff bounds (ms)
export const INITIAL_BACKOFF_MS = 1000;
export const MAX_BACKOFF_MS = 30000;

// Logged chat messages are kept for a day
export const MESSAGE_RETENTION_MS = 24 * 60 * 60 * 1000;

// Window used by /mysteps
export const PERSONAL_STATS_DAYS = 30;

// Firestore collection names
export const COLLECTIONS = {
  users: "users",
  reports: "reports",
  medals: "medals",
  messages: "messages",
  processedMessages: "processedMessages",
} as const;

// Replies sent back to report authors
export const REPLIES = {
  missingNickname: "Отсутствует #ник",
  missingSteps: "Отсутствует количество шагов",
  storeFailed: "Ошибка сохранения данных",
  accepted: (nickname: string) => `#${nickname} - принято`,
};
