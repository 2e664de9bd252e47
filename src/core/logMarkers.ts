export type LogMark =
  | 'lifecycle'
  | 'connect'
  | 'socket'
  | 'auth'
  | 'heartbeat'
  | 'subscribe'
  | 'cleanup'
  | 'timeout'
  | 'shutdown'
  | 'ok'
  | 'warn'
  | 'error';

const MARK: Record<LogMark, string> = {
  lifecycle: '🔄',
  connect: '📡',
  socket: '🔌',
  auth: '🔑',
  heartbeat: '💓',
  subscribe: '📬',
  cleanup: '🧹',
  timeout: '⏳',
  shutdown: '🛑',
  ok: '✅',
  warn: '⚠️',
  error: '❌',
};

// Фича-флаг: LOG_MARKERS=on|off|auto (по умолчанию auto: включено в TTY, выключено в CI/pipe)
const raw = (process.env.LOG_MARKERS ?? 'auto').toLowerCase();
const ENABLED = (() => {
  if (['0', 'off', 'false'].includes(raw)) return false;
  if (['1', 'on', 'true'].includes(raw)) return true;
  return Boolean(process.stdout.isTTY) && !process.env.CI;
})();

/**
 * Добавляет эмодзи-маркер в начало сообщения.
 * Возвращает обычную строку, не меняя формат логов.
 */
export function m(mark: LogMark, message: string): string {
  if (!ENABLED) return message;
  return `${MARK[mark]} ${message}`;
}
